/**
 * Unit tests for encoder adapters (ffmpeg, stub, factory).
 * fluent-ffmpeg is replaced by an in-process fake that writes a placeholder file.
 */

import { EventEmitter } from "events";
import * as fs from "fs";
import * as path from "path";
import { FfmpegEncoder, StubEncoder, createEncoder, loudnormFilter } from "../../../src/adapters/encoder";
import type { EncodeOptions } from "../../../src/adapters/encoder";
import type { AppConfig } from "../../../src/config";
import { CancelledError, ExportError } from "../../../src/errors";
import { pcmToWav } from "../../../src/pipeline/audio-utils";

class MockFfmpegCommand extends EventEmitter {
  codec?: string;
  frequency?: number;
  channels?: number;
  outputFormat?: string;
  ffmpegPath?: string;
  filters: string[] = [];
  outputPath?: string;
  killedWith?: string;

  constructor(readonly input: string) {
    super();
  }

  audioCodec(codec: string): this {
    this.codec = codec;
    return this;
  }
  audioFrequency(hz: number): this {
    this.frequency = hz;
    return this;
  }
  audioChannels(n: number): this {
    this.channels = n;
    return this;
  }
  format(f: string): this {
    this.outputFormat = f;
    return this;
  }
  setFfmpegPath(p: string): this {
    this.ffmpegPath = p;
    return this;
  }
  audioFilters(filter: string): this {
    this.filters.push(filter);
    return this;
  }
  kill(signal: string): void {
    this.killedWith = signal;
    setImmediate(() => this.emit("error", new Error(`ffmpeg was killed with signal ${signal}`), null, null));
  }
  save(outputPath: string): this {
    this.outputPath = outputPath;
    this.inputBytes = fs.readFileSync(this.input);
    mockAfterSave(this);
    if (mockOutcome === "succeed") {
      fs.writeFileSync(outputPath, Buffer.from(`encoded ${this.outputFormat ?? ""}`));
      setImmediate(() => this.emit("end", null, null));
    } else if (mockOutcome === "fail") {
      setImmediate(() =>
        this.emit("error", new Error("Conversion failed!"), "", "  [Parsed_loudnorm_0] bad value \n")
      );
    }
    return this;
  }
  inputBytes?: Buffer;
}

const mockCommands: MockFfmpegCommand[] = [];
let mockOutcome: "succeed" | "fail" | "hang" = "succeed";
let mockAfterSave: (command: MockFfmpegCommand) => void = () => undefined;

jest.mock("fluent-ffmpeg", () =>
  jest.fn((input: string) => {
    const command = new MockFfmpegCommand(input);
    mockCommands.push(command);
    return command;
  })
);

const wav = pcmToWav(Buffer.alloc(2205 * 2), 22050);
const loudness = { targetLufs: -16, truePeakDb: -1.5, loudnessRangeLu: 11 };

function options(overrides: Partial<EncodeOptions> = {}): EncodeOptions {
  return { format: "mp3", sampleRateHz: 22050, channels: 1, ...overrides };
}

beforeEach(() => {
  mockCommands.length = 0;
  mockOutcome = "succeed";
  mockAfterSave = () => undefined;
});

describe("loudnormFilter", () => {
  it("formats the EBU R128 target", () => {
    expect(loudnormFilter(loudness)).toBe("loudnorm=I=-16:TP=-1.5:LRA=11");
    expect(loudnormFilter({ targetLufs: -23, truePeakDb: -2, loudnessRangeLu: 7 })).toBe("loudnorm=I=-23:TP=-2:LRA=7");
  });
});

describe("FfmpegEncoder", () => {
  it("normalizes and encodes mp3", async () => {
    const out = await new FfmpegEncoder().encode(wav, options({ loudness }));
    expect(out.toString()).toBe("encoded mp3");

    const [command] = mockCommands;
    expect(command.inputBytes?.equals(wav)).toBe(true);
    expect(command.codec).toBe("libmp3lame");
    expect(command.frequency).toBe(22050);
    expect(command.channels).toBe(1);
    expect(command.outputFormat).toBe("mp3");
    expect(command.filters).toEqual(["loudnorm=I=-16:TP=-1.5:LRA=11"]);
    expect(command.ffmpegPath).toBeUndefined();
    expect(path.basename(command.outputPath ?? "")).toBe("output.mp3");
  });

  it("encodes without a filter when loudness is not requested", async () => {
    await new FfmpegEncoder().encode(wav, options({ format: "ogg" }));
    expect(mockCommands[0].codec).toBe("libvorbis");
    expect(mockCommands[0].filters).toEqual([]);
  });

  it("uses the configured ffmpeg binary", async () => {
    await new FfmpegEncoder({ ffmpegPath: "/opt/ffmpeg/bin/ffmpeg" }).encode(wav, options({ format: "wav", loudness }));
    expect(mockCommands[0].ffmpegPath).toBe("/opt/ffmpeg/bin/ffmpeg");
    expect(mockCommands[0].codec).toBe("pcm_s16le");
  });

  it("removes its temp dir after encoding", async () => {
    await new FfmpegEncoder().encode(wav, options());
    const workDir = path.dirname(mockCommands[0].input);
    expect(path.basename(workDir).startsWith("narrator-")).toBe(true);
    expect(fs.existsSync(workDir)).toBe(false);
  });

  it("surfaces ffmpeg's stderr as diagnostics", async () => {
    mockOutcome = "fail";
    const run = new FfmpegEncoder().encode(wav, options({ loudness }));
    await expect(run).rejects.toThrow(ExportError);
    await expect(run).rejects.toMatchObject({
      message: "ffmpeg failed: Conversion failed!",
      diagnostics: "[Parsed_loudnorm_0] bad value",
    });
    expect(fs.existsSync(path.dirname(mockCommands[0].input))).toBe(false);
  });

  it("kills ffmpeg when cancelled", async () => {
    mockOutcome = "hang";
    const controller = new AbortController();
    mockAfterSave = () => controller.abort();
    await expect(new FfmpegEncoder().encode(wav, options(), controller.signal)).rejects.toThrow(CancelledError);
    expect(mockCommands[0].killedWith).toBe("SIGKILL");
    expect(fs.existsSync(path.dirname(mockCommands[0].input))).toBe(false);
  });

  it("does not start ffmpeg once cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    await expect(new FfmpegEncoder().encode(wav, options(), controller.signal)).rejects.toThrow(CancelledError);
    expect(mockCommands).toHaveLength(0);
  });
});

describe("StubEncoder", () => {
  it("passes WAV through", async () => {
    const out = await new StubEncoder().encode(wav, options({ format: "wav", loudness }));
    expect(out).toBe(wav);
  });

  it("refuses lossy formats", async () => {
    await expect(new StubEncoder().encode(wav, options({ format: "mp3" }))).rejects.toThrow(
      "Stub encoder cannot write mp3; use ENCODER_PROVIDER=ffmpeg"
    );
  });
});

describe("createEncoder", () => {
  const base: AppConfig = {
    tts: { provider: "stub", piperBinary: "piper", timeoutMs: 1000 },
    encoder: { provider: "stub" },
    narration: { emotionsConfigPath: "config/emotions.json", loudness, onSynthesisError: "abort" },
  };

  it("returns StubEncoder when provider is stub", () => {
    expect(createEncoder(base)).toBeInstanceOf(StubEncoder);
  });

  it("returns FfmpegEncoder when provider is ffmpeg", () => {
    expect(createEncoder({ ...base, encoder: { provider: "ffmpeg" } })).toBeInstanceOf(FfmpegEncoder);
  });
});
