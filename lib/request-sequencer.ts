export interface SequencedRequest {
  id: number;
  signal: AbortSignal;
}

/**
 * Last-submitted-wins bookkeeping for a single browser session. Starting a
 * request aborts the one before it, and a late response from an older
 * request is recognised as stale.
 */
export class RequestSequencer {
  private latestId = 0;
  private controller: AbortController | null = null;

  begin(): SequencedRequest {
    this.controller?.abort();
    this.controller = new AbortController();
    this.latestId += 1;
    return { id: this.latestId, signal: this.controller.signal };
  }

  isCurrent(id: number): boolean {
    return id === this.latestId;
  }

  cancel(): void {
    this.controller?.abort();
    this.controller = null;
    this.latestId += 1;
  }
}
