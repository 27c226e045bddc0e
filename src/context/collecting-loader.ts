import type { ContextBinaryLoader, LoadContextRequest } from "./backend.js";

/**
 * Loader that keeps every request instead of handing it to a device.
 * Used to extract and verify context models without a backend.
 */
export class CollectingLoader implements ContextBinaryLoader {
  readonly requests: LoadContextRequest[] = [];

  async loadContextBinary(request: LoadContextRequest): Promise<void> {
    this.requests.push(request);
  }
}
