import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { AuthMiddleware } from './auth.middleware';
import { CleanupService } from './cleanup/cleanup.service';
import { CommandQueueService } from './commands/command-queue.service';
import { MediaSourceSink } from './commands/media-source.sink';
import { validateEnv } from './config/env.validation';
import { DeviceRegistryService } from './devices/device-registry.service';
import { CapabilityMatcherService } from './selection/capability-matcher.service';
import { TrackSelectorService } from './selection/track-selector.service';

@Module({
  imports: [ScheduleModule.forRoot(), ConfigModule.forRoot({ isGlobal: true, validate: validateEnv })],
  controllers: [AppController],
  providers: [
    AppService,
    CapabilityMatcherService,
    TrackSelectorService,
    DeviceRegistryService,
    CommandQueueService,
    MediaSourceSink,
    CleanupService,
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer
      .apply(AuthMiddleware)
      .forRoutes(
        'statistics',
        'devices/*',
        'playback-info',
        'sessions/*',
        'select',
        // /config stays public so the host can check the toggle without a key
      );
  }
}
