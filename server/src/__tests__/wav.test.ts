import { decodeWav, encodeWav } from "../audio/wav";
import { InvalidAudioError } from "../errors";

function rawWav(opts: { channels: number; bits: number; rate: number; data: Buffer; extra?: Buffer }): Buffer {
  const fmt = Buffer.alloc(24);
  fmt.write("fmt ", 0, "ascii");
  fmt.writeUInt32LE(16, 4);
  fmt.writeUInt16LE(1, 8);
  fmt.writeUInt16LE(opts.channels, 10);
  fmt.writeUInt32LE(opts.rate, 12);
  fmt.writeUInt32LE((opts.rate * opts.channels * opts.bits) / 8, 16);
  fmt.writeUInt16LE((opts.channels * opts.bits) / 8, 20);
  fmt.writeUInt16LE(opts.bits, 22);

  const dataHeader = Buffer.alloc(8);
  dataHeader.write("data", 0, "ascii");
  dataHeader.writeUInt32LE(opts.data.length, 4);

  const body = Buffer.concat([fmt, ...(opts.extra ? [opts.extra] : []), dataHeader, opts.data]);
  const riff = Buffer.alloc(12);
  riff.write("RIFF", 0, "ascii");
  riff.writeUInt32LE(4 + body.length, 4);
  riff.write("WAVE", 8, "ascii");
  return Buffer.concat([riff, body]);
}

function int16(values: number[]): Buffer {
  const b = Buffer.alloc(values.length * 2);
  values.forEach((v, i) => b.writeInt16LE(v, i * 2));
  return b;
}

describe("encodeWav", () => {
  it("writes a canonical PCM16 mono header", () => {
    const buf = encodeWav({ samples: Int16Array.of(1, 2), sampleRate: 8000 });

    expect(buf.length).toBe(48);
    expect(buf.toString("ascii", 0, 4)).toBe("RIFF");
    expect(buf.readUInt32LE(4)).toBe(40);
    expect(buf.toString("ascii", 8, 16)).toBe("WAVEfmt ");
    expect(buf.readUInt16LE(20)).toBe(1);
    expect(buf.readUInt16LE(22)).toBe(1);
    expect(buf.readUInt32LE(24)).toBe(8000);
    expect(buf.readUInt32LE(28)).toBe(16000);
    expect(buf.readUInt16LE(34)).toBe(16);
    expect(buf.toString("ascii", 36, 40)).toBe("data");
    expect(buf.readUInt32LE(40)).toBe(4);
    expect(buf.readInt16LE(44)).toBe(1);
    expect(buf.readInt16LE(46)).toBe(2);
  });
});

describe("decodeWav", () => {
  it("reads back what encodeWav wrote", () => {
    const samples = Int16Array.of(0, 1, -1, 32767, -32768);
    const decoded = decodeWav(encodeWav({ samples, sampleRate: 16000 }));

    expect(Array.from(decoded.samples)).toEqual([0, 1, -1, 32767, -32768]);
    expect(decoded.sampleRate).toBe(16000);
    expect(decoded.channels).toBe(1);
    expect(decoded.durationSec).toBeCloseTo(5 / 16000);
  });

  it("averages stereo down to mono", () => {
    const decoded = decodeWav(rawWav({ channels: 2, bits: 16, rate: 8000, data: int16([100, 300, -100, -201]) }));
    expect(Array.from(decoded.samples)).toEqual([200, -150]);
    expect(decoded.channels).toBe(2);
  });

  it("skips unknown chunks before the data", () => {
    const list = Buffer.concat([Buffer.from("LIST", "ascii"), Buffer.from([4, 0, 0, 0]), Buffer.from("INFO", "ascii")]);
    const decoded = decodeWav(rawWav({ channels: 1, bits: 16, rate: 8000, data: int16([7, 8]), extra: list }));
    expect(Array.from(decoded.samples)).toEqual([7, 8]);
  });

  it("rejects non-WAV bytes", () => {
    expect(() => decodeWav(Buffer.from("ID3\u0003 definitely an mp3"))).toThrow(InvalidAudioError);
  });

  it("rejects unsupported bit depths", () => {
    expect(() => decodeWav(rawWav({ channels: 1, bits: 8, rate: 8000, data: Buffer.from([1, 2]) }))).toThrow(
      "unsupported bit depth 8",
    );
  });

  it("rejects a file with no samples", () => {
    expect(() => decodeWav(rawWav({ channels: 1, bits: 16, rate: 8000, data: Buffer.alloc(0) }))).toThrow(
      "audio contains no samples",
    );
  });
});
