import { Injectable, Logger } from '@nestjs/common';
import { Cron, CronExpression } from '@nestjs/schedule';
import { ConfigService } from '@nestjs/config';
import { CommandQueueService } from '../commands/command-queue.service';
import { DeviceRegistryService } from '../devices/device-registry.service';

@Injectable()
export class CleanupService {
  private readonly logger = new Logger(CleanupService.name);
  private readonly commandRetentionMs: number;
  private readonly deviceRetentionMs: number;

  constructor(
    private readonly configService: ConfigService,
    private readonly commandQueue: CommandQueueService,
    private readonly deviceRegistry: DeviceRegistryService,
  ) {
    const commandRetentionMinutes = this.configService.get<number>('COMMAND_RETENTION_MINUTES', 10);
    this.commandRetentionMs = commandRetentionMinutes * 60 * 1000;

    const deviceRetentionHours = this.configService.get<number>('DEVICE_RETENTION_HOURS', 48);
    this.deviceRetentionMs = deviceRetentionHours * 60 * 60 * 1000;
  }

  /**
   * A switch command nobody picked up is stale: playback has moved on
   */
  @Cron(CronExpression.EVERY_MINUTE)
  handleCommandCleanup(now: Date = new Date()): number {
    const cutoffTime = now.getTime() - this.commandRetentionMs;
    const removedCount = this.commandQueue.removeOlderThan(cutoffTime);

    if (removedCount > 0) {
      this.logger.log(`Dropped ${removedCount} expired session commands`);
    }

    return removedCount;
  }

  @Cron(CronExpression.EVERY_HOUR)
  handleDeviceCleanup(now: Date = new Date()): number {
    const cutoffTime = now.getTime() - this.deviceRetentionMs;
    const staleDevices = this.deviceRegistry.getOlderThan(cutoffTime);

    let removedCount = 0;
    for (const device of staleDevices) {
      if (this.deviceRegistry.remove(device.deviceId)) {
        removedCount++;
        this.logger.debug(`Removed device ${device.deviceId} (last seen: ${device.lastSeen.toISOString()})`);
      }
    }

    if (removedCount > 0) {
      this.logger.log(`Removed ${removedCount} devices not seen for ${this.deviceRetentionMs / (60 * 60 * 1000)} hours`);
    } else {
      this.logger.debug('No devices eligible for cleanup');
    }

    return removedCount;
  }
}
