import { Injectable, Logger } from '@nestjs/common';
import {
  DEFAULT_PREFERRED_LANGUAGE,
  REFERENCE_BITRATE,
  SCORE_WEIGHTS,
  SPATIAL_BONUS_FORMATS,
} from '../constants';
import { CapabilityMatcherService, normalizeCodec } from './capability-matcher.service';
import { AudioSpatialFormat, AudioTrack, RankedTrack, TrackScore } from './interfaces/audio-track.interface';
import { ClientProfile, describeClient } from './interfaces/device-profile.interface';
import { SelectionResult } from './interfaces/selection-result.interface';

// Checked top-down so that e.g. "dts-hd ma" lands in the lossless tier, not in "dts"
const CODEC_TIERS: ReadonlyArray<{ score: number; exact: string[]; contains: string[] }> = [
  { score: 100, exact: ['flac', 'pcm', 'alac'], contains: ['truehd', 'dts-hd ma', 'dts-hdma'] },
  { score: 80, exact: ['eac3', 'ec3', 'dts'], contains: ['dts-hd hra', 'dts-hdhra'] },
  { score: 60, exact: ['ac3', 'aac'], contains: [] },
  { score: 40, exact: ['mp3', 'vorbis', 'opus'], contains: [] },
];

const UNLISTED_CODEC_SCORE = 20;

/**
 * Get the quality score for an audio codec (0-100 points)
 */
export function getCodecQualityScore(codec: string | undefined): number {
  const normalizedCodec = normalizeCodec(codec);
  if (!normalizedCodec) {
    return 0;
  }

  const tier = CODEC_TIERS.find(
    candidate =>
      candidate.exact.includes(normalizedCodec) ||
      candidate.contains.some(fragment => normalizedCodec.includes(fragment)),
  );

  return tier ? tier.score : UNLISTED_CODEC_SCORE;
}

/**
 * Get the score for a channel count relative to the device ceiling (0-100 points)
 */
export function getChannelScore(channels: number | undefined, maxChannels: number): number {
  if (channels === undefined || channels <= 0) {
    return 0;
  }

  return Math.min(100, (channels / maxChannels) * 100);
}

/**
 * Get the score for bitrate, linear up to the reference bitrate (0-100 points)
 */
export function getBitrateScore(bitrate: number | undefined): number {
  if (bitrate === undefined || bitrate <= 0) {
    return 0;
  }

  return Math.min(100, (bitrate / REFERENCE_BITRATE) * 100);
}

export function getSpatialAudioBonus(spatialFormat: AudioSpatialFormat | undefined): number {
  return spatialFormat !== undefined && SPATIAL_BONUS_FORMATS.has(spatialFormat) ? 10 : 0;
}

export function getLanguageMatchBonus(trackLanguage: string | undefined, preferredLanguage: string | undefined): number {
  if (!trackLanguage || !preferredLanguage) {
    return 0;
  }

  return trackLanguage.toLowerCase() === preferredLanguage.toLowerCase() ? 5 : 0;
}

@Injectable()
export class TrackSelectorService {
  private readonly logger = new Logger(TrackSelectorService.name);

  constructor(private readonly capabilityMatcher: CapabilityMatcherService) {}

  /**
   * Pick the audio track to play. Returns null when no decision can be made,
   * in which case the host keeps its own default.
   */
  select(
    tracks: readonly AudioTrack[],
    client: ClientProfile,
    preferredLanguage: string = DEFAULT_PREFERRED_LANGUAGE,
  ): number | null {
    return this.evaluate(tracks, client, preferredLanguage).index;
  }

  /**
   * Same decision as select(), with the reason and the ranking behind it
   */
  evaluate(
    tracks: readonly AudioTrack[],
    client: ClientProfile,
    preferredLanguage: string = DEFAULT_PREFERRED_LANGUAGE,
  ): SelectionResult {
    const audioTracks = tracks.filter(track => track.type === 'Audio');

    if (audioTracks.length === 0) {
      this.logger.debug('No audio streams found');
      return { index: null, reason: 'no-audio', ranking: [] };
    }

    if (audioTracks.length === 1) {
      this.logger.debug('Only one audio stream available, using it');
      return { index: audioTracks[0].index, reason: 'single-track', ranking: [] };
    }

    this.logger.debug(
      `Selecting audio track from ${audioTracks.length} available streams for device profile: ${describeClient(client)}`,
    );

    const ranking = this.rank(audioTracks, client, preferredLanguage);

    if (ranking.length === 0) {
      this.logger.warn(`No compatible audio streams for device profile ${describeClient(client)}, trying fallback`);

      // Searched over every audio track, not just the admissible ones
      const fallback = this.findFallback(audioTracks);
      if (fallback) {
        this.logger.log(`Selected fallback audio track ${fallback.index}: ${fallback.codec} ${fallback.channels ?? 0}ch`);
        return { index: fallback.index, reason: 'fallback', ranking };
      }

      this.logger.warn('No fallback stream found, leaving default selection');
      return { index: null, reason: 'no-fallback', ranking };
    }

    const [best] = ranking;
    this.logger.debug(
      `Selected audio track ${best.track.index}: "${best.track.codec}" ${best.track.channels ?? 0}ch ` +
        `${Math.round((best.track.bitRate ?? 0) / 1000)}kbps (score ${best.score.total.toFixed(2)})`,
    );

    return { index: best.track.index, reason: 'ranked', ranking };
  }

  /**
   * Admissible audio tracks ordered best first. Equal scores keep their input order.
   */
  rank(
    tracks: readonly AudioTrack[],
    client: ClientProfile,
    preferredLanguage: string = DEFAULT_PREFERRED_LANGUAGE,
  ): RankedTrack[] {
    const maxChannels = this.capabilityMatcher.maxChannels(client);
    const ranked = tracks
      .filter(track => this.capabilityMatcher.canPlay(track, client))
      .map(track => ({ track, score: this.computeScore(track, maxChannels, preferredLanguage) }));

    for (const { track, score } of ranked) {
      this.logger.debug(`Stream ${track.index} (${track.codec} ${track.channels ?? 0}ch): score = ${score.total.toFixed(2)}`);
    }

    // Array.prototype.sort is stable, so ties resolve to the first track seen
    return ranked.sort((a, b) => b.score.total - a.score.total);
  }

  scoreTrack(track: AudioTrack, client: ClientProfile, preferredLanguage?: string): TrackScore {
    return this.computeScore(track, this.capabilityMatcher.maxChannels(client), preferredLanguage);
  }

  // score = 40% codec + 30% channels + 15% bitrate + 10% spatial + 5% language
  private computeScore(track: AudioTrack, maxChannels: number, preferredLanguage?: string): TrackScore {
    const codec = getCodecQualityScore(track.codec);
    const channels = getChannelScore(track.channels, maxChannels);
    const bitrate = getBitrateScore(track.bitRate);
    const spatial = getSpatialAudioBonus(track.spatialFormat);
    const language = getLanguageMatchBonus(track.language, preferredLanguage);

    const total =
      codec * SCORE_WEIGHTS.codec +
      channels * SCORE_WEIGHTS.channels +
      bitrate * SCORE_WEIGHTS.bitrate +
      spatial * SCORE_WEIGHTS.spatial +
      language * SCORE_WEIGHTS.language;

    return { codec, channels, bitrate, spatial, language, total };
  }

  /**
   * Best guess at a broadly playable track when nothing passes the device checks
   */
  findFallback(tracks: readonly AudioTrack[]): AudioTrack | null {
    const isCodec = (track: AudioTrack, codec: string) => normalizeCodec(track.codec) === codec;

    return (
      tracks.find(track => isCodec(track, 'aac') && track.channels === 2) ??
      tracks.find(track => isCodec(track, 'ac3') && track.channels === 2) ??
      tracks.find(track => isCodec(track, 'aac')) ??
      tracks.find(track => isCodec(track, 'ac3')) ??
      null
    );
  }
}
