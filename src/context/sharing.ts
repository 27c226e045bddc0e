/**
 * SharingSession: which blob file a run of sharing encode calls reuses.
 *
 * Created and owned by the caller and passed to every encode call of the
 * run. The first contributor registers its file name; later contributors
 * reuse it; the last contributor clears it. One session object must only
 * be used by one run at a time.
 */

export class SharingSession {
  private fileName: string | null = null;

  /** Registered shared file name, or null when none is active. */
  get sharedFileName(): string | null {
    return this.fileName;
  }

  get active(): boolean {
    return this.fileName !== null;
  }

  /**
   * Register `candidate` if no name is active yet; otherwise keep the
   * active name.
   *
   * @returns The name every contributor of this run must reference
   */
  claim(candidate: string): { fileName: string; registered: boolean } {
    if (this.fileName === null) {
      this.fileName = candidate;
      return { fileName: candidate, registered: true };
    }
    return { fileName: this.fileName, registered: false };
  }

  /** End the run. The next claim registers a fresh name. */
  clear(): void {
    this.fileName = null;
  }
}
