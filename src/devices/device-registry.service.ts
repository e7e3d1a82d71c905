import { Injectable, Logger } from '@nestjs/common';
import { toClientProfile } from '../host/host.mappers';
import { DeviceProfileDto } from '../host/host.schemas';
import { ClientProfile, NO_PROFILE, describeClient } from '../selection/interfaces/device-profile.interface';
import { RegisteredDevice } from './interfaces/registered-device.interface';

/**
 * Capabilities reported by clients, keyed by device id. Kept in memory only;
 * clients report again when they reconnect.
 */
@Injectable()
export class DeviceRegistryService {
  private readonly logger = new Logger(DeviceRegistryService.name);
  private devices: Map<string, RegisteredDevice> = new Map();

  register(deviceId: string, profile: DeviceProfileDto | null | undefined): RegisteredDevice {
    const now = new Date();
    const device: RegisteredDevice = {
      deviceId,
      client: toClientProfile(profile),
      registeredAt: now,
      lastSeen: now,
    };

    this.devices.set(deviceId, device);
    this.logger.log(`Registered capabilities for device ${deviceId}: ${describeClient(device.client)}`);
    return device;
  }

  /**
   * Profile for a device. Unknown or missing ids resolve to "no profile".
   */
  resolve(deviceId?: string | null): ClientProfile {
    if (!deviceId) {
      this.logger.debug('No device ID supplied, using conservative defaults');
      return NO_PROFILE;
    }

    const device = this.devices.get(deviceId);
    if (!device) {
      this.logger.debug(`No capabilities registered for device ${deviceId}`);
      return NO_PROFILE;
    }

    device.lastSeen = new Date();
    return device.client;
  }

  getDevice(deviceId: string): RegisteredDevice | null {
    return this.devices.get(deviceId) || null;
  }

  remove(deviceId: string): boolean {
    const removed = this.devices.delete(deviceId);
    if (removed) {
      this.logger.debug(`Removed device ${deviceId}`);
    }
    return removed;
  }

  /**
   * Devices not seen since the cutoff (epoch milliseconds)
   */
  getOlderThan(cutoffTime: number): RegisteredDevice[] {
    return Array.from(this.devices.values()).filter(device => device.lastSeen.getTime() < cutoffTime);
  }

  getStats(): { total: number; withProfile: number } {
    let withProfile = 0;
    for (const device of this.devices.values()) {
      if (device.client.kind === 'device') {
        withProfile++;
      }
    }

    return { total: this.devices.size, withProfile };
  }
}
