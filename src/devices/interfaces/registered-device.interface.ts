import { ClientProfile } from '../../selection/interfaces/device-profile.interface';

export interface RegisteredDevice {
  deviceId: string;
  client: ClientProfile;
  registeredAt: Date;
  lastSeen: Date;
}
