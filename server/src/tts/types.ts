export type RequestContext = {
  requestId: string;
  signal?: AbortSignal; // aborts when the client disconnects
};
