import type { Waveform } from "../audio/types";

export type JoinOptions = {
  gapMs: number;
  fadeMs: number;
  /** absolute sample value at or below which audio counts as silence */
  silenceThreshold: number;
};

export const DEFAULT_JOIN: JoinOptions = {
  gapMs: 80,
  fadeMs: 5,
  silenceThreshold: 64,
};

export function trimSilence(samples: Int16Array, threshold: number, edges: { start: boolean; end: boolean }): Int16Array {
  let from = 0;
  let to = samples.length;
  if (edges.start) {
    while (from < to && Math.abs(samples[from]) <= threshold) from++;
  }
  if (edges.end) {
    while (to > from && Math.abs(samples[to - 1]) <= threshold) to--;
  }
  return samples.subarray(from, to);
}

function fade(samples: Int16Array, fadeLen: number, edges: { in: boolean; out: boolean }): Int16Array {
  const out = Int16Array.from(samples);
  const n = Math.min(fadeLen, Math.floor(out.length / 2));
  if (n === 0) return out;

  for (let k = 0; k < n; k++) {
    const gain = k / n;
    if (edges.in) out[k] = Math.round(out[k] * gain);
    if (edges.out) out[out.length - 1 - k] = Math.round(out[out.length - 1 - k] * gain);
  }
  return out;
}

// interior joins: trim silence, fade to zero, insert the gap; outer edges untouched
export function joinWaveforms(parts: Waveform[], opts: JoinOptions = DEFAULT_JOIN): Waveform {
  if (parts.length === 0) throw new RangeError("joinWaveforms needs at least one part");

  const sampleRate = parts[0].sampleRate;
  if (parts.some((p) => p.sampleRate !== sampleRate)) {
    throw new RangeError("joinWaveforms parts must share a sample rate");
  }
  if (parts.length === 1) return { samples: Int16Array.from(parts[0].samples), sampleRate };

  const gap = Math.round((opts.gapMs * sampleRate) / 1000);
  const fadeLen = Math.round((opts.fadeMs * sampleRate) / 1000);
  const last = parts.length - 1;

  const segments = parts.map((p, i) => {
    const edges = { start: i > 0, end: i < last };
    const trimmed = trimSilence(p.samples, opts.silenceThreshold, edges);
    return fade(trimmed, fadeLen, { in: edges.start, out: edges.end });
  });

  const total = segments.reduce((n, s) => n + s.length, 0) + gap * last;
  const samples = new Int16Array(total);
  let offset = 0;
  segments.forEach((s, i) => {
    samples.set(s, offset);
    offset += s.length;
    if (i < last) offset += gap;
  });

  return { samples, sampleRate };
}
