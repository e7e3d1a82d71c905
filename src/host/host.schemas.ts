import { z } from 'zod';

// Host payloads keep the media server's PascalCase JSON. Fields we do not read
// are passed through untouched so rewritten responses lose nothing.

const optionalNumber = z.number().nullish();
const optionalString = z.string().nullish();

export const MediaStreamSchema = z
  .object({
    Index: z.number().int(),
    Type: z.string(),
    Codec: optionalString,
    Channels: optionalNumber,
    BitRate: optionalNumber,
    AudioSpatialFormat: optionalString,
    Language: optionalString,
    Title: optionalString,
    ChannelLayout: optionalString,
    SampleRate: optionalNumber,
  })
  .passthrough();

export const MediaSourceSchema = z
  .object({
    Id: optionalString,
    Name: optionalString,
    MediaStreams: z.array(MediaStreamSchema).nullish(),
    DefaultAudioStreamIndex: z.number().int().nullish(),
  })
  .passthrough();

export const PlaybackInfoResponseSchema = z
  .object({
    MediaSources: z.array(MediaSourceSchema),
    PlaySessionId: optionalString,
  })
  .passthrough();

const AudioCodecProfileSchema = z
  .object({
    Type: z.string(),
    AudioCodec: optionalString,
  })
  .passthrough();

const ProfileConditionSchema = z
  .object({
    Condition: z.string(),
    Property: z.string(),
    Value: optionalString,
  })
  .passthrough();

const CodecProfileSchema = z
  .object({
    Type: z.string(),
    Conditions: z.array(ProfileConditionSchema).nullish(),
  })
  .passthrough();

export const DeviceProfileSchema = z
  .object({
    Name: optionalString,
    MaxStaticBitrate: optionalNumber,
    MaxStaticMusicBitrate: optionalNumber,
    DirectPlayProfiles: z.array(AudioCodecProfileSchema).nullish(),
    TranscodingProfiles: z.array(AudioCodecProfileSchema).nullish(),
    CodecProfiles: z.array(CodecProfileSchema).nullish(),
  })
  .passthrough();

export const ClientCapabilitiesSchema = z
  .object({
    DeviceProfile: DeviceProfileSchema.nullish(),
  })
  .passthrough();

export const PlaybackStartEventSchema = z.object({
  DeviceId: optionalString,
  DeviceName: optionalString,
  Client: optionalString,
  MediaSourceId: optionalString,
  Item: z
    .object({
      Id: optionalString,
      Name: optionalString,
      MediaSources: z.array(MediaSourceSchema).nullish(),
    })
    .nullish(),
});

export const SelectRequestSchema = z.object({
  MediaStreams: z.array(MediaStreamSchema),
  DeviceProfile: DeviceProfileSchema.nullish(),
  PreferredLanguage: z.string().min(1).optional(),
});

export type MediaStreamDto = z.infer<typeof MediaStreamSchema>;
export type MediaSourceDto = z.infer<typeof MediaSourceSchema>;
export type PlaybackInfoResponseDto = z.infer<typeof PlaybackInfoResponseSchema>;
export type DeviceProfileDto = z.infer<typeof DeviceProfileSchema>;
export type ClientCapabilitiesDto = z.infer<typeof ClientCapabilitiesSchema>;
export type PlaybackStartEventDto = z.infer<typeof PlaybackStartEventSchema>;
export type SelectRequestDto = z.infer<typeof SelectRequestSchema>;
