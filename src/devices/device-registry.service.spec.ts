import { DeviceProfileSchema } from '../host/host.schemas';
import { DeviceRegistryService } from './device-registry.service';

describe('DeviceRegistryService', () => {
  let registry: DeviceRegistryService;

  const appleTv = DeviceProfileSchema.parse({
    Name: 'Apple TV',
    DirectPlayProfiles: [{ Type: 'Video', AudioCodec: 'aac,ac3,eac3' }],
  });

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(new Date('2026-01-01T00:00:00.000Z'));
    registry = new DeviceRegistryService();
  });

  afterEach(() => {
    jest.useRealTimers();
  });

  it('resolves a registered profile', () => {
    registry.register('device-1', appleTv);

    const client = registry.resolve('device-1');
    expect(client.kind).toBe('device');
    if (client.kind === 'device') {
      expect(client.profile.name).toBe('Apple TV');
      expect(client.profile.directPlayProfiles).toEqual([{ type: 'Video', audioCodecs: ['aac', 'ac3', 'eac3'] }]);
    }
  });

  it('resolves unknown and missing devices to no profile', () => {
    expect(registry.resolve('device-1')).toEqual({ kind: 'none' });
    expect(registry.resolve(undefined)).toEqual({ kind: 'none' });
    expect(registry.resolve(null)).toEqual({ kind: 'none' });
    expect(registry.resolve('')).toEqual({ kind: 'none' });
  });

  it('registers a device without a profile', () => {
    const device = registry.register('device-1', null);

    expect(device.client).toEqual({ kind: 'none' });
    expect(registry.getStats()).toEqual({ total: 1, withProfile: 0 });
  });

  it('replaces an earlier registration', () => {
    registry.register('device-1', null);
    registry.register('device-1', appleTv);

    expect(registry.resolve('device-1').kind).toBe('device');
    expect(registry.getStats()).toEqual({ total: 1, withProfile: 1 });
  });

  it('updates lastSeen when a device is resolved', () => {
    registry.register('device-1', appleTv);
    jest.setSystemTime(new Date('2026-01-02T00:00:00.000Z'));

    registry.resolve('device-1');

    const device = registry.getDevice('device-1');
    expect(device?.registeredAt).toEqual(new Date('2026-01-01T00:00:00.000Z'));
    expect(device?.lastSeen).toEqual(new Date('2026-01-02T00:00:00.000Z'));
  });

  it('removes devices', () => {
    registry.register('device-1', appleTv);

    expect(registry.remove('device-1')).toBe(true);
    expect(registry.remove('device-1')).toBe(false);
    expect(registry.getDevice('device-1')).toBeNull();
  });

  it('lists devices not seen since the cutoff', () => {
    registry.register('device-1', appleTv);
    jest.setSystemTime(new Date('2026-01-03T00:00:00.000Z'));
    registry.register('device-2', null);

    const stale = registry.getOlderThan(new Date('2026-01-02T00:00:00.000Z').getTime());
    expect(stale.map(device => device.deviceId)).toEqual(['device-1']);
  });
});
