import { Injectable, Logger } from '@nestjs/common';
import {
  APPLE_TV_NAME_PATTERNS,
  DEFAULT_MAX_CHANNELS,
  NO_PROFILE_MAX_CHANNELS,
  UNIVERSAL_AUDIO_CODECS,
} from '../constants';
import { AudioSpatialFormat, AudioTrack } from './interfaces/audio-track.interface';
import { ClientProfile, CodecAllowList, DeviceProfile } from './interfaces/device-profile.interface';

export function normalizeCodec(codec: string | undefined): string {
  return (codec || '').trim().toLowerCase();
}

export function isUniversallySupportedCodec(codec: string | undefined): boolean {
  const normalizedCodec = normalizeCodec(codec);
  return normalizedCodec !== '' && UNIVERSAL_AUDIO_CODECS.has(normalizedCodec);
}

export function isAppleTvProfile(profile: DeviceProfile): boolean {
  if (!profile.name) {
    return false;
  }

  const profileName = profile.name.toLowerCase();
  return APPLE_TV_NAME_PATTERNS.some(pattern => profileName.includes(pattern));
}

/**
 * Decides whether a client can decode a track, and how many channels it can
 * take. Pure: nothing here depends on state outside the arguments.
 */
@Injectable()
export class CapabilityMatcherService {
  private readonly logger = new Logger(CapabilityMatcherService.name);

  canPlay(track: AudioTrack, client: ClientProfile): boolean {
    if (track.type !== 'Audio' || normalizeCodec(track.codec) === '') {
      return false;
    }

    // Without a profile only the universal codecs are trusted
    if (client.kind === 'none') {
      return isUniversallySupportedCodec(track.codec);
    }

    const profile = client.profile;

    if (!this.supportsCodec(track.codec, profile)) {
      this.logger.debug(`Codec ${track.codec} not supported by device profile ${profile.name}`);
      return false;
    }

    if (this.isKnown(track.channels) && track.channels > this.maxChannels(client)) {
      this.logger.debug(`Channel count ${track.channels} exceeds device profile ${profile.name} limits`);
      return false;
    }

    if (this.isKnown(track.bitRate) && !this.supportsBitrate(track.bitRate, profile)) {
      this.logger.debug(`Bitrate ${track.bitRate} exceeds device profile ${profile.name} limits`);
      return false;
    }

    const spatialFormat = track.spatialFormat ?? AudioSpatialFormat.None;
    if (spatialFormat !== AudioSpatialFormat.None && !this.supportsSpatialAudio(spatialFormat, profile)) {
      this.logger.debug(`Spatial audio format ${spatialFormat} not supported by device profile ${profile.name}`);
      return false;
    }

    return true;
  }

  /**
   * Effective channel ceiling. Never below 1, even when a profile declares a
   * limit of zero or less.
   */
  maxChannels(client: ClientProfile): number {
    if (client.kind === 'none') {
      return NO_PROFILE_MAX_CHANNELS;
    }

    let maxChannels = DEFAULT_MAX_CHANNELS;
    for (const limit of client.profile.channelLimits) {
      if (limit.appliesToAudio) {
        maxChannels = Math.min(maxChannels, limit.maxChannels);
      }
    }

    return Math.max(1, maxChannels);
  }

  private supportsCodec(codec: string, profile: DeviceProfile): boolean {
    const normalizedCodec = normalizeCodec(codec);

    // SwiftFin cannot decode TrueHD, whatever the profile claims
    if (isAppleTvProfile(profile) && normalizedCodec.includes('truehd')) {
      this.logger.debug('Excluding TrueHD for Apple TV/SwiftFin profile');
      return false;
    }

    const directPlay = profile.directPlayProfiles.some(
      allowList =>
        (allowList.type === 'Audio' || allowList.type === 'Video') &&
        this.listsCodec(allowList, normalizedCodec),
    );
    if (directPlay) {
      return true;
    }

    if (profile.transcodingCodecs.some(entry => normalizeCodec(entry) === normalizedCodec)) {
      return true;
    }

    return isUniversallySupportedCodec(normalizedCodec);
  }

  private listsCodec(allowList: CodecAllowList, normalizedCodec: string): boolean {
    return allowList.audioCodecs.some(entry => normalizeCodec(entry) === normalizedCodec);
  }

  private supportsBitrate(bitrate: number, profile: DeviceProfile): boolean {
    if (profile.maxStaticMusicBitrate !== undefined && bitrate > profile.maxStaticMusicBitrate) {
      return false;
    }

    if (profile.maxStaticBitrate !== undefined && bitrate > profile.maxStaticBitrate) {
      return false;
    }

    return true;
  }

  private supportsSpatialAudio(spatialFormat: AudioSpatialFormat, profile: DeviceProfile): boolean {
    // Apple TV plays Atmos through DD+ with Atmos metadata
    if (isAppleTvProfile(profile) && spatialFormat === AudioSpatialFormat.DolbyAtmos) {
      return true;
    }

    // No per-device spatial restrictions yet; the base codec gate decides
    return true;
  }

  private isKnown(value: number | undefined): value is number {
    return value !== undefined && value > 0;
  }
}
