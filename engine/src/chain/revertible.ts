// Anything the host can roll back when an invocation fails.
export interface Revertible {
  /** Capture current state; the returned function restores it. */
  checkpoint(): () => void;
}
