import { Injectable } from '@nestjs/common';
import { MediaSourceDto } from '../host/host.schemas';
import { DecisionSink } from './interfaces/decision-sink.interface';

/**
 * Applies a decision by rewriting the default audio stream of a media source
 * before the playback-info response reaches the client.
 */
@Injectable()
export class MediaSourceSink implements DecisionSink<MediaSourceDto> {
  apply(source: MediaSourceDto, audioStreamIndex: number): void {
    source.DefaultAudioStreamIndex = audioStreamIndex;
  }
}
