export type MediaStreamType = 'Audio' | 'Video' | 'Subtitle' | 'EmbeddedImage' | 'Data' | 'Lyric';

export enum AudioSpatialFormat {
  None = 'None',
  DolbyAtmos = 'DolbyAtmos',
  DTSX = 'DTSX',
  Other = 'Other',
}

export interface AudioTrack {
  index: number; // Returned to the host as the decision
  type: MediaStreamType;
  codec: string; // Empty when the host did not probe it
  channels?: number;
  bitRate?: number; // Bits per second
  spatialFormat?: AudioSpatialFormat;
  language?: string; // ISO 639
  title?: string;

  // Display-only
  channelLayout?: string;
  sampleRate?: number;
}

export interface TrackScore {
  codec: number;
  channels: number;
  bitrate: number;
  spatial: number;
  language: number;
  total: number; // Weighted sum of the above
}

export interface RankedTrack {
  track: AudioTrack;
  score: TrackScore;
}
