import {
  Body,
  Controller,
  Delete,
  Get,
  Headers,
  HttpCode,
  HttpStatus,
  Logger,
  NotFoundException,
  Param,
  Post,
  Query,
} from '@nestjs/common';
import { AppService, SelectionStatistics, SourceDecision } from './app.service';
import { CommandQueueService } from './commands/command-queue.service';
import { QueuedCommand } from './commands/interfaces/queued-command.interface';
import { ZodValidationPipe } from './common/zod-validation.pipe';
import { DeviceRegistryService } from './devices/device-registry.service';
import {
  ClientCapabilitiesDto,
  ClientCapabilitiesSchema,
  PlaybackInfoResponseDto,
  PlaybackInfoResponseSchema,
  PlaybackStartEventDto,
  PlaybackStartEventSchema,
  SelectRequestDto,
  SelectRequestSchema,
} from './host/host.schemas';
import { describeClient } from './selection/interfaces/device-profile.interface';
import { SelectionResult } from './selection/interfaces/selection-result.interface';

@Controller()
export class AppController {
  private readonly logger = new Logger(AppController.name);

  constructor(
    private readonly appService: AppService,
    private readonly deviceRegistry: DeviceRegistryService,
    private readonly commandQueue: CommandQueueService,
  ) {}

  @Get('statistics')
  getStatistics(): SelectionStatistics {
    return this.appService.getStatistics();
  }

  @Get('config')
  getConfig() {
    return this.appService.getConfig();
  }

  @Post('devices/:deviceId/capabilities')
  registerCapabilities(
    @Param('deviceId') deviceId: string,
    @Body(new ZodValidationPipe(ClientCapabilitiesSchema)) capabilities: ClientCapabilitiesDto,
  ): { deviceId: string; profile: string } {
    const device = this.deviceRegistry.register(deviceId, capabilities.DeviceProfile);
    return { deviceId, profile: describeClient(device.client) };
  }

  @Delete('devices/:deviceId')
  removeDevice(@Param('deviceId') deviceId: string): { message: string } {
    if (!this.deviceRegistry.remove(deviceId)) {
      throw new NotFoundException(`Device ${deviceId} is not registered`);
    }
    return { message: 'Device removed' };
  }

  /**
   * Rewrites DefaultAudioStreamIndex on every media source. The device id is
   * read the same way the host reads it: query first, then header.
   */
  @Post('playback-info')
  @HttpCode(HttpStatus.OK)
  rewritePlaybackInfo(
    @Body(new ZodValidationPipe(PlaybackInfoResponseSchema)) response: PlaybackInfoResponseDto,
    @Query('DeviceId') queryDeviceId?: string,
    @Headers('x-emby-device-id') headerDeviceId?: string,
  ): PlaybackInfoResponseDto {
    const deviceId = queryDeviceId || headerDeviceId;
    const result = this.appService.applyToPlaybackInfo(response, deviceId);
    this.logger.debug(`Playback info for device ${deviceId ?? 'unknown'}: ${result.decisions.length} source(s) evaluated`);
    return result.response;
  }

  @Post('sessions/:sessionId/playback-start')
  @HttpCode(HttpStatus.OK)
  playbackStart(
    @Param('sessionId') sessionId: string,
    @Body(new ZodValidationPipe(PlaybackStartEventSchema)) event: PlaybackStartEventDto,
  ): { decisions: SourceDecision[] } {
    return { decisions: this.appService.handlePlaybackStart(sessionId, event) };
  }

  @Get('sessions/:sessionId/commands')
  getPendingCommands(@Param('sessionId') sessionId: string): QueuedCommand[] {
    return this.commandQueue.getPending(sessionId);
  }

  @Delete('sessions/:sessionId/commands/:commandId')
  acknowledgeCommand(
    @Param('sessionId') sessionId: string,
    @Param('commandId') commandId: string,
  ): { message: string } {
    if (!this.commandQueue.acknowledge(sessionId, commandId)) {
      throw new NotFoundException(`Command ${commandId} not found for session ${sessionId}`);
    }
    return { message: 'Command acknowledged' };
  }

  @Post('select')
  @HttpCode(HttpStatus.OK)
  select(@Body(new ZodValidationPipe(SelectRequestSchema)) request: SelectRequestDto): SelectionResult {
    return this.appService.selectTracks(request);
  }
}
