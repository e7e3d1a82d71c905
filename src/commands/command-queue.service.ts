import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { SET_AUDIO_STREAM_INDEX } from '../constants';
import { DecisionSink, SessionTarget } from './interfaces/decision-sink.interface';
import { CommandQueueStats, QueuedCommand } from './interfaces/queued-command.interface';

/**
 * Pending session commands, polled by the host and acknowledged once sent to
 * the client.
 */
@Injectable()
export class CommandQueueService implements DecisionSink<SessionTarget> {
  private readonly logger = new Logger(CommandQueueService.name);
  private commands: Map<string, QueuedCommand[]> = new Map(); // sessionId -> pending commands

  /**
   * Queue a SetAudioStreamIndex command for the session
   */
  apply(target: SessionTarget, audioStreamIndex: number): void {
    this.enqueue(target, SET_AUDIO_STREAM_INDEX, { Index: audioStreamIndex.toString() });
  }

  /**
   * Queue a command. A pending command with the same name for the same
   * session is replaced, so the client only ever gets the latest decision.
   */
  enqueue(target: SessionTarget, name: string, args: Record<string, string>): QueuedCommand {
    const command: QueuedCommand = {
      id: uuidv4(),
      sessionId: target.sessionId,
      deviceId: target.deviceId,
      name,
      arguments: args,
      createdAt: new Date(),
    };

    const pending = (this.commands.get(target.sessionId) || []).filter(existing => existing.name !== name);
    pending.push(command);
    this.commands.set(target.sessionId, pending);

    this.logger.log(`Queued ${name} ${JSON.stringify(args)} for session ${target.sessionId} -> command ${command.id}`);
    return command;
  }

  getPending(sessionId: string): QueuedCommand[] {
    return [...(this.commands.get(sessionId) || [])];
  }

  acknowledge(sessionId: string, commandId: string): boolean {
    const pending = this.commands.get(sessionId);
    if (!pending) {
      return false;
    }

    const remaining = pending.filter(command => command.id !== commandId);
    if (remaining.length === pending.length) {
      return false;
    }

    this.setPending(sessionId, remaining);
    this.logger.debug(`Command ${commandId} acknowledged for session ${sessionId}`);
    return true;
  }

  /**
   * Drop commands created before the cutoff (epoch milliseconds)
   */
  removeOlderThan(cutoffTime: number): number {
    let removedCount = 0;

    for (const [sessionId, pending] of Array.from(this.commands.entries())) {
      const remaining = pending.filter(command => command.createdAt.getTime() >= cutoffTime);
      removedCount += pending.length - remaining.length;
      this.setPending(sessionId, remaining);
    }

    return removedCount;
  }

  getStats(): CommandQueueStats {
    let pendingCount = 0;
    let oldestCommand: Date | null = null;

    for (const pending of this.commands.values()) {
      pendingCount += pending.length;
      for (const command of pending) {
        if (!oldestCommand || command.createdAt < oldestCommand) {
          oldestCommand = command.createdAt;
        }
      }
    }

    return {
      pending: pendingCount,
      sessions: this.commands.size,
      oldestCommand,
    };
  }

  private setPending(sessionId: string, pending: QueuedCommand[]): void {
    if (pending.length === 0) {
      this.commands.delete(sessionId);
    } else {
      this.commands.set(sessionId, pending);
    }
  }
}
