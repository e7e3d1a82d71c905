import { AudioSpatialFormat } from './selection/interfaces/audio-track.interface';

export const DEFAULT_PREFERRED_LANGUAGE = 'eng';

// Decodable by practically every client, used when no profile is known
export const UNIVERSAL_AUDIO_CODECS: ReadonlySet<string> = new Set(['aac', 'ac3', 'mp3', 'eac3', 'vorbis']);

export const APPLE_TV_NAME_PATTERNS = ['apple tv', 'appletv', 'swiftfin', 'tvos'];

export const DEFAULT_MAX_CHANNELS = 8;
export const NO_PROFILE_MAX_CHANNELS = 2;

export const REFERENCE_BITRATE = 1_500_000;

export const SCORE_WEIGHTS = {
  codec: 0.4,
  channels: 0.3,
  bitrate: 0.15,
  spatial: 0.1,
  language: 0.05,
} as const;

export const SPATIAL_BONUS_FORMATS: ReadonlySet<AudioSpatialFormat> = new Set([
  AudioSpatialFormat.DolbyAtmos,
  AudioSpatialFormat.DTSX,
]);

export const SET_AUDIO_STREAM_INDEX = 'SetAudioStreamIndex';
