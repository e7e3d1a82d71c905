import { NotFoundException } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { Test, TestingModule } from '@nestjs/testing';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { CommandQueueService } from './commands/command-queue.service';
import { MediaSourceSink } from './commands/media-source.sink';
import { DeviceRegistryService } from './devices/device-registry.service';
import { ClientCapabilitiesSchema, PlaybackInfoResponseSchema, PlaybackStartEventSchema, SelectRequestSchema } from './host/host.schemas';
import { CapabilityMatcherService } from './selection/capability-matcher.service';
import { TrackSelectorService } from './selection/track-selector.service';

const playbackInfo = () =>
  PlaybackInfoResponseSchema.parse({
    MediaSources: [
      {
        Id: 'source-1',
        DefaultAudioStreamIndex: 1,
        MediaStreams: [
          { Index: 0, Type: 'Video', Codec: 'h264' },
          { Index: 1, Type: 'Audio', Codec: 'truehd', Channels: 8, BitRate: 3500000 },
          { Index: 2, Type: 'Audio', Codec: 'eac3', Channels: 6, BitRate: 640000 },
        ],
      },
    ],
  });

const appleTvCapabilities = ClientCapabilitiesSchema.parse({
  DeviceProfile: {
    Name: 'Apple TV',
    DirectPlayProfiles: [{ Type: 'Video', AudioCodec: 'truehd,eac3,ac3,aac' }],
  },
});

describe('AppController', () => {
  let controller: AppController;
  let commandQueue: CommandQueueService;

  beforeEach(async () => {
    const module: TestingModule = await Test.createTestingModule({
      controllers: [AppController],
      providers: [
        AppService,
        CapabilityMatcherService,
        TrackSelectorService,
        DeviceRegistryService,
        CommandQueueService,
        MediaSourceSink,
        { provide: ConfigService, useValue: new ConfigService({ PREFERRED_AUDIO_LANGUAGE: 'eng' }) },
      ],
    }).compile();

    controller = module.get(AppController);
    commandQueue = module.get(CommandQueueService);
  });

  it('returns the public configuration', () => {
    expect(controller.getConfig()).toEqual({ enabled: true, preferredAudioLanguage: 'eng' });
  });

  describe('devices', () => {
    it('registers capabilities', () => {
      expect(controller.registerCapabilities('device-1', appleTvCapabilities)).toEqual({
        deviceId: 'device-1',
        profile: 'Apple TV',
      });
      expect(controller.registerCapabilities('device-2', ClientCapabilitiesSchema.parse({}))).toEqual({
        deviceId: 'device-2',
        profile: 'Unknown',
      });
      expect(controller.getStatistics().devices).toEqual({ total: 2, withProfile: 1 });
    });

    it('removes a registered device', () => {
      controller.registerCapabilities('device-1', appleTvCapabilities);
      expect(controller.removeDevice('device-1')).toEqual({ message: 'Device removed' });
    });

    it('rejects removing an unknown device', () => {
      expect(() => controller.removeDevice('device-1')).toThrow(NotFoundException);
    });
  });

  describe('rewritePlaybackInfo', () => {
    it('reads the device id from the query', () => {
      controller.registerCapabilities('device-1', appleTvCapabilities);

      const response = controller.rewritePlaybackInfo(playbackInfo(), 'device-1', undefined);
      expect(response.MediaSources[0].DefaultAudioStreamIndex).toBe(2);
    });

    it('falls back to the device id header', () => {
      controller.registerCapabilities('device-1', appleTvCapabilities);

      const response = controller.rewritePlaybackInfo(playbackInfo(), undefined, 'device-1');
      expect(response.MediaSources[0].DefaultAudioStreamIndex).toBe(2);
    });

    it('uses conservative defaults without a device id', () => {
      const response = controller.rewritePlaybackInfo(playbackInfo(), undefined, undefined);
      expect(response.MediaSources[0].DefaultAudioStreamIndex).toBe(2);
    });
  });

  describe('session commands', () => {
    const startEvent = PlaybackStartEventSchema.parse({
      DeviceId: 'device-1',
      Item: { Name: 'Movie', MediaSources: playbackInfo().MediaSources },
    });

    it('queues and acknowledges a switch command', () => {
      controller.registerCapabilities('device-1', appleTvCapabilities);

      const { decisions } = controller.playbackStart('session-1', startEvent);
      expect(decisions).toEqual([
        {
          mediaSourceId: 'source-1',
          mediaSourceName: undefined,
          previousIndex: 1,
          selectedIndex: 2,
          outcome: 'switched',
        },
      ]);

      const [command] = controller.getPendingCommands('session-1');
      expect(command.arguments).toEqual({ Index: '2' });

      expect(controller.acknowledgeCommand('session-1', command.id)).toEqual({ message: 'Command acknowledged' });
      expect(commandQueue.getPending('session-1')).toEqual([]);
    });

    it('rejects acknowledging an unknown command', () => {
      expect(() => controller.acknowledgeCommand('session-1', 'missing')).toThrow(NotFoundException);
    });
  });

  it('selects from an explicit track list', () => {
    const result = controller.select(
      SelectRequestSchema.parse({
        MediaStreams: [
          { Index: 1, Type: 'Audio', Codec: 'mp3', Channels: 2 },
          { Index: 2, Type: 'Audio', Codec: 'aac', Channels: 2 },
        ],
      }),
    );

    expect(result.index).toBe(2);
    expect(result.reason).toBe('ranked');
  });
});
