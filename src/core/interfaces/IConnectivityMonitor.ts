/**
 * Interface for network reachability
 */
export interface IConnectivityMonitor {
  isOnline(): boolean;

  /**
   * Subscribe to changes; returns an unsubscribe function
   */
  onChange(listener: (online: boolean) => void): () => void;
}
