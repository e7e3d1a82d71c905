export type DlnaProfileType = 'Audio' | 'Video' | 'Photo';

export interface CodecAllowList {
  type: DlnaProfileType;
  audioCodecs: string[];
}

export interface ChannelLimit {
  appliesToAudio: boolean;
  maxChannels: number;
}

export interface DeviceProfile {
  name?: string;
  directPlayProfiles: CodecAllowList[];
  transcodingCodecs: string[]; // Reachable through a transcode
  channelLimits: ChannelLimit[];
  maxStaticBitrate?: number;
  maxStaticMusicBitrate?: number;
}

/**
 * What the selector knows about the client. `none` means the host has no
 * profile registered for the device, which is not the same as an empty profile.
 */
export type ClientProfile =
  | { readonly kind: 'none' }
  | { readonly kind: 'device'; readonly profile: DeviceProfile };

export const NO_PROFILE: ClientProfile = { kind: 'none' };

export function deviceProfile(profile: DeviceProfile): ClientProfile {
  return { kind: 'device', profile };
}

export function describeClient(client: ClientProfile): string {
  return client.kind === 'device' ? client.profile.name || 'Unnamed profile' : 'Unknown';
}
