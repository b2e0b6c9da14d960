import { Injectable, Logger, OnApplicationBootstrap, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { SchedulerRegistry } from '@nestjs/schedule';
import { AppConfig } from '../config/configuration';
import { CheckAndPublishPosts } from './check-and-publish.service';
import { AdminAlertService } from '../notifications/admin-alert.service';
import { errorMessage } from '../common/result';

export const CHECK_POSTS_INTERVAL = 'check_posts';

@Injectable()
export class PostSchedulerService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly logger = new Logger(PostSchedulerService.name);
  private readonly intervalMinutes: number;
  private readonly timeZone: string;
  private polling = false;

  constructor(
    configService: ConfigService<AppConfig, true>,
    private readonly schedulerRegistry: SchedulerRegistry,
    private readonly checkAndPublish: CheckAndPublishPosts,
    private readonly adminAlert: AdminAlertService,
  ) {
    const scheduler = configService.get('scheduler', { infer: true });
    this.intervalMinutes = scheduler.checkIntervalMinutes;
    this.timeZone = scheduler.timezone;
  }

  onApplicationBootstrap(): void {
    this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  start(): void {
    if (this.isRunning()) {
      this.logger.warn('Scheduler already running');
      return;
    }
    const interval = setInterval(() => {
      void this.poll();
    }, this.intervalMinutes * 60_000);
    this.schedulerRegistry.addInterval(CHECK_POSTS_INTERVAL, interval);
    this.logger.log(`⏰ Scheduler started, checking every ${this.intervalMinutes} minutes (timezone: ${this.timeZone})`);
  }

  stop(): void {
    if (this.isRunning()) {
      this.schedulerRegistry.deleteInterval(CHECK_POSTS_INTERVAL);
      this.logger.log('🛑 Scheduler stopped');
    }
  }

  isRunning(): boolean {
    return this.schedulerRegistry.doesExist('interval', CHECK_POSTS_INTERVAL);
  }

  /** Runs a poll on demand; returns the number of posts published. */
  triggerNow(): Promise<number> {
    return this.poll();
  }

  // A tick that arrives while a poll is in flight is skipped.
  private async poll(): Promise<number> {
    if (this.polling) {
      this.logger.warn('Previous post check still running, skipping this tick');
      return 0;
    }
    this.polling = true;
    try {
      return await this.checkAndPublish.execute({
        onSuccess: async post => {
          await this.adminAlert.notifyAdmin(`✅ Post published successfully on ${post.platform}`);
        },
        onError: async message => {
          await this.adminAlert.notifyAdmin(`❌ ${message}`);
        },
      });
    } catch (error) {
      const message = `Scheduler error: ${errorMessage(error)}`;
      this.logger.error(message);
      await this.adminAlert.notifyAdmin(`⚠️ ${message}`);
      return 0;
    } finally {
      this.polling = false;
    }
  }
}
