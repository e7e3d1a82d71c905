/**
 * Receives a chosen audio stream index and applies it to the host. The
 * selector never knows whether that means editing a response or messaging a
 * session.
 */
export interface DecisionSink<TTarget> {
  apply(target: TTarget, audioStreamIndex: number): void;
}

export interface SessionTarget {
  sessionId: string;
  deviceId?: string;
}
