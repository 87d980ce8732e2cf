export interface RefreshActivity {
  isLoading: boolean;
  isAnalyzing: boolean;
}

/**
 * Decides whether a refresh may start now or must wait for the running one.
 * At most one deferred refresh is remembered; extra triggers while busy collapse into it.
 */
export class RefreshStateMachine {
  private pendingRefresh = false;

  /** An automatic trigger (store changed, timer). Ignored entirely when auto-refresh is off. */
  handleTrigger(activity: RefreshActivity & { autoRefreshEnabled: boolean }): boolean {
    if (!activity.autoRefreshEnabled) return false;
    return this.prepareForLoad(activity);
  }

  /** An explicit load request. */
  prepareForLoad(activity: RefreshActivity): boolean {
    if (activity.isLoading || activity.isAnalyzing) {
      this.pendingRefresh = true;
      return false;
    }
    return true;
  }

  /** Read and clear the deferred-refresh flag. */
  consumePendingRefresh(): boolean {
    const pending = this.pendingRefresh;
    this.pendingRefresh = false;
    return pending;
  }

  get hasPendingRefresh(): boolean {
    return this.pendingRefresh;
  }
}
