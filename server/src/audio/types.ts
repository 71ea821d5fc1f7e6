export type Waveform = {
  samples: Int16Array; // mono PCM16
  sampleRate: number;
};

export type DecodedWav = Waveform & {
  channels: number;
  durationSec: number;
};
