export interface QueuedCommand {
  id: string;
  sessionId: string;
  deviceId?: string;
  name: string; // e.g. SetAudioStreamIndex
  arguments: Record<string, string>;
  createdAt: Date;
}

export interface CommandQueueStats {
  pending: number;
  sessions: number;
  oldestCommand: Date | null;
}
