import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { CommandQueueService } from './commands/command-queue.service';
import { MediaSourceSink } from './commands/media-source.sink';
import { DEFAULT_PREFERRED_LANGUAGE } from './constants';
import { DeviceRegistryService } from './devices/device-registry.service';
import { toAudioTracks, toClientProfile } from './host/host.mappers';
import {
  MediaSourceDto,
  PlaybackInfoResponseDto,
  PlaybackStartEventDto,
  SelectRequestDto,
} from './host/host.schemas';
import { AudioTrack } from './selection/interfaces/audio-track.interface';
import { ClientProfile, describeClient } from './selection/interfaces/device-profile.interface';
import { SelectionResult } from './selection/interfaces/selection-result.interface';
import { TrackSelectorService } from './selection/track-selector.service';

export interface SourceDecision {
  mediaSourceId: string | null;
  mediaSourceName?: string;
  previousIndex: number | null;
  selectedIndex: number | null;
  outcome: 'switched' | 'unchanged' | 'no-decision';
}

export interface PlaybackInfoResult {
  response: PlaybackInfoResponseDto;
  decisions: SourceDecision[];
}

export interface SelectionStatistics {
  enabled: boolean;
  preferredAudioLanguage: string;
  evaluations: number;
  selections: number;
  fallbacks: number;
  noDecisions: number;
  switchesQueued: number;
  devices: { total: number; withProfile: number };
  commands: { pending: number; sessions: number; oldestCommand: Date | null };
}

function describeSource(source: MediaSourceDto): string {
  return source.Name || source.Id || 'unnamed source';
}

@Injectable()
export class AppService {
  private readonly logger = new Logger(AppService.name);
  private readonly enabled: boolean;
  private readonly preferredLanguage: string;

  private evaluations = 0;
  private selections = 0;
  private fallbacks = 0;
  private noDecisions = 0;
  private switchesQueued = 0;

  constructor(
    private readonly configService: ConfigService,
    private readonly trackSelector: TrackSelectorService,
    private readonly deviceRegistry: DeviceRegistryService,
    private readonly commandQueue: CommandQueueService,
    private readonly mediaSourceSink: MediaSourceSink,
  ) {
    this.enabled = this.configService.get<boolean>('AUDIO_SELECTOR_ENABLED', true);
    this.preferredLanguage = this.configService.get<string>('PREFERRED_AUDIO_LANGUAGE', DEFAULT_PREFERRED_LANGUAGE);
  }

  getConfig(): { enabled: boolean; preferredAudioLanguage: string } {
    return { enabled: this.enabled, preferredAudioLanguage: this.preferredLanguage };
  }

  /**
   * Set the default audio stream of every media source in a playback-info
   * response. The input is left untouched; a rewritten copy is returned.
   */
  applyToPlaybackInfo(response: PlaybackInfoResponseDto, deviceId?: string | null): PlaybackInfoResult {
    if (!this.enabled) {
      this.logger.debug('Audio track selection is disabled, skipping playback info');
      return { response, decisions: [] };
    }

    const client = this.deviceRegistry.resolve(deviceId);
    const rewritten = structuredClone(response);
    const decisions: SourceDecision[] = [];

    for (const source of rewritten.MediaSources) {
      const selection = this.evaluateSource(source, client);
      if (!selection) {
        continue;
      }

      const decision = this.toDecision(source, selection);
      if (selection.index !== null) {
        this.mediaSourceSink.apply(source, selection.index);
        this.logger.log(
          `[PlaybackInfo] DefaultAudioStreamIndex ${decision.previousIndex ?? -1} -> ${selection.index} ` +
            `for source '${describeSource(source)}'`,
        );
      }
      decisions.push(decision);
    }

    return { response: rewritten, decisions };
  }

  /**
   * Playback has already started: when the best track differs from the one
   * playing, queue a switch command for the session.
   */
  handlePlaybackStart(sessionId: string, event: PlaybackStartEventDto): SourceDecision[] {
    if (!this.enabled) {
      this.logger.debug('Audio track selection is disabled, skipping playback start');
      return [];
    }

    const mediaSources = event.Item?.MediaSources;
    if (!mediaSources || mediaSources.length === 0) {
      this.logger.warn(`No media sources in playback start event for session ${sessionId}`);
      return [];
    }

    const client = this.deviceRegistry.resolve(event.DeviceId);
    this.logger.log(
      `Playback of '${event.Item?.Name || 'Unknown item'}' on '${event.DeviceName || event.DeviceId || 'unknown device'}' ` +
        `(${event.Client || 'unknown client'}), profile: ${describeClient(client)}`,
    );

    const sources = event.MediaSourceId
      ? mediaSources.filter(source => source.Id === event.MediaSourceId)
      : mediaSources;

    const decisions: SourceDecision[] = [];
    for (const source of sources) {
      const selection = this.evaluateSource(source, client);
      if (!selection) {
        continue;
      }

      const decision = this.toDecision(source, selection);
      if (decision.outcome === 'switched' && selection.index !== null) {
        this.logger.log(`Switching audio track from ${decision.previousIndex ?? -1} to ${selection.index}`);
        this.commandQueue.apply({ sessionId, deviceId: event.DeviceId ?? undefined }, selection.index);
        this.switchesQueued++;
      } else if (decision.outcome === 'unchanged') {
        this.logger.log('Optimal track is already the default, no switch needed');
      }
      decisions.push(decision);
    }

    return decisions;
  }

  /**
   * Decision for an explicit track list, independent of registered devices
   */
  selectTracks(request: SelectRequestDto): SelectionResult {
    const client = toClientProfile(request.DeviceProfile);
    const tracks = toAudioTracks(request.MediaStreams);
    return this.trackSelector.evaluate(tracks, client, request.PreferredLanguage ?? this.preferredLanguage);
  }

  getStatistics(): SelectionStatistics {
    return {
      enabled: this.enabled,
      preferredAudioLanguage: this.preferredLanguage,
      evaluations: this.evaluations,
      selections: this.selections,
      fallbacks: this.fallbacks,
      noDecisions: this.noDecisions,
      switchesQueued: this.switchesQueued,
      devices: this.deviceRegistry.getStats(),
      commands: this.commandQueue.getStats(),
    };
  }

  /**
   * Null for sources with fewer than two audio streams, which have nothing to choose
   */
  private evaluateSource(source: MediaSourceDto, client: ClientProfile): SelectionResult | null {
    const tracks = toAudioTracks(source.MediaStreams);
    const audioTracks = tracks.filter(track => track.type === 'Audio');
    if (audioTracks.length <= 1) {
      return null;
    }

    this.evaluations++;
    const selection = this.trackSelector.evaluate(tracks, client, this.preferredLanguage);

    if (selection.index === null) {
      this.noDecisions++;
      this.logger.warn(`No audio track selected for source '${describeSource(source)}', keeping default`);
    } else {
      this.selections++;
      if (selection.reason === 'fallback') {
        this.fallbacks++;
      }
      this.logTrackTable(audioTracks, selection.index, source.DefaultAudioStreamIndex);
    }

    return selection;
  }

  private toDecision(source: MediaSourceDto, selection: SelectionResult): SourceDecision {
    const previousIndex = source.DefaultAudioStreamIndex ?? null;
    let outcome: SourceDecision['outcome'] = 'no-decision';
    if (selection.index !== null) {
      outcome = selection.index === previousIndex ? 'unchanged' : 'switched';
    }

    return {
      mediaSourceId: source.Id ?? null,
      mediaSourceName: source.Name ?? undefined,
      previousIndex,
      selectedIndex: selection.index,
      outcome,
    };
  }

  private logTrackTable(tracks: AudioTrack[], selectedIndex: number, previousIndex: number | null | undefined): void {
    this.logger.debug(`Selected audio track ${selectedIndex}, original default was ${previousIndex ?? -1}`);
    for (const track of [...tracks].sort((a, b) => a.index - b.index)) {
      const marker = track.index === selectedIndex ? '->' : '  ';
      this.logger.debug(
        `${marker} [${track.index}] ${track.codec || '?'} ${track.channels ?? 0}ch ` +
          `${Math.round((track.bitRate ?? 0) / 1000)}kbps - Lang:${track.language ?? '?'} Title:${track.title ?? 'none'}`,
      );
    }
  }
}
