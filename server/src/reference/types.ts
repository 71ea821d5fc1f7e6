import type { ReferenceVoice } from "../model/types";

export type ReferenceAsset = ReferenceVoice & {
  source: string;
  /** request-scoped temp directory, removed by release() */
  dir: string;
  wavPath: string;
  originalBytes: number;
  contentType: string | null;
  release(): Promise<void>;
};

export type FetchContext = {
  requestId: string;
  signal?: AbortSignal;
};

export type Downloaded = {
  bytes: Buffer;
  contentType: string | null;
};
