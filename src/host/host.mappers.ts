import { AudioSpatialFormat, AudioTrack, MediaStreamType } from '../selection/interfaces/audio-track.interface';
import {
  ChannelLimit,
  ClientProfile,
  CodecAllowList,
  DeviceProfile,
  DlnaProfileType,
  NO_PROFILE,
  deviceProfile,
} from '../selection/interfaces/device-profile.interface';
import { DeviceProfileDto, MediaStreamDto } from './host.schemas';

const STREAM_TYPES: readonly MediaStreamType[] = ['Audio', 'Video', 'Subtitle', 'EmbeddedImage', 'Data', 'Lyric'];
const PROFILE_TYPES: readonly DlnaProfileType[] = ['Audio', 'Video', 'Photo'];

// Codec profile types whose conditions constrain the audio stream
const AUDIO_CODEC_PROFILE_TYPES = ['Audio', 'VideoAudio'];

const WHOLE_NUMBER = /^[+-]?\d+$/;

function findIgnoreCase<T extends string>(values: readonly T[], value: string): T | undefined {
  const lowered = value.toLowerCase();
  return values.find(candidate => candidate.toLowerCase() === lowered);
}

function equalsIgnoreCase(value: string, expected: string): boolean {
  return value.toLowerCase() === expected.toLowerCase();
}

function positiveOrUndefined(value: number | null | undefined): number | undefined {
  return value !== null && value !== undefined && value > 0 ? value : undefined;
}

/**
 * Split a comma-separated AudioCodec field ("aac,ac3, eac3") into lower-cased entries
 */
export function splitCodecList(audioCodec: string | null | undefined): string[] {
  if (!audioCodec) {
    return [];
  }

  return audioCodec
    .split(',')
    .map(codec => codec.trim().toLowerCase())
    .filter(codec => codec.length > 0);
}

export function toSpatialFormat(value: string | null | undefined): AudioSpatialFormat {
  if (!value) {
    return AudioSpatialFormat.None;
  }

  const known = findIgnoreCase(
    [AudioSpatialFormat.None, AudioSpatialFormat.DolbyAtmos, AudioSpatialFormat.DTSX],
    value,
  );
  return known ?? AudioSpatialFormat.Other;
}

export function toAudioTrack(stream: MediaStreamDto): AudioTrack {
  return {
    index: stream.Index,
    type: findIgnoreCase(STREAM_TYPES, stream.Type) ?? 'Data',
    codec: stream.Codec ?? '',
    channels: positiveOrUndefined(stream.Channels),
    bitRate: positiveOrUndefined(stream.BitRate),
    spatialFormat: toSpatialFormat(stream.AudioSpatialFormat),
    language: stream.Language || undefined,
    title: stream.Title || undefined,
    channelLayout: stream.ChannelLayout || undefined,
    sampleRate: positiveOrUndefined(stream.SampleRate),
  };
}

export function toAudioTracks(streams: readonly MediaStreamDto[] | null | undefined): AudioTrack[] {
  return (streams ?? []).map(toAudioTrack);
}

/**
 * Channel limits come from "AudioChannels LessThanEqual n" conditions, matched
 * case-insensitively. Other conditions and values that are not whole numbers
 * are ignored.
 */
function toChannelLimits(dto: DeviceProfileDto): ChannelLimit[] {
  const limits: ChannelLimit[] = [];

  for (const codecProfile of dto.CodecProfiles ?? []) {
    for (const condition of codecProfile.Conditions ?? []) {
      if (
        !equalsIgnoreCase(condition.Property, 'AudioChannels') ||
        !equalsIgnoreCase(condition.Condition, 'LessThanEqual')
      ) {
        continue;
      }

      const value = (condition.Value ?? '').trim();
      if (!WHOLE_NUMBER.test(value)) {
        continue;
      }

      limits.push({
        appliesToAudio: findIgnoreCase(AUDIO_CODEC_PROFILE_TYPES, codecProfile.Type) !== undefined,
        maxChannels: Number.parseInt(value, 10),
      });
    }
  }

  return limits;
}

export function toDeviceProfile(dto: DeviceProfileDto): DeviceProfile {
  const directPlayProfiles: CodecAllowList[] = [];
  for (const directPlay of dto.DirectPlayProfiles ?? []) {
    const type = findIgnoreCase(PROFILE_TYPES, directPlay.Type);
    if (type) {
      directPlayProfiles.push({ type, audioCodecs: splitCodecList(directPlay.AudioCodec) });
    }
  }

  return {
    name: dto.Name || undefined,
    directPlayProfiles,
    transcodingCodecs: (dto.TranscodingProfiles ?? []).flatMap(profile => splitCodecList(profile.AudioCodec)),
    channelLimits: toChannelLimits(dto),
    // Clients send 0 for "no limit"
    maxStaticBitrate: positiveOrUndefined(dto.MaxStaticBitrate),
    maxStaticMusicBitrate: positiveOrUndefined(dto.MaxStaticMusicBitrate),
  };
}

export function toClientProfile(dto: DeviceProfileDto | null | undefined): ClientProfile {
  return dto ? deviceProfile(toDeviceProfile(dto)) : NO_PROFILE;
}
