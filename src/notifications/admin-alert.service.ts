import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppConfig } from '../config/configuration';
import { MessageSender } from '../telegram/message-sender';
import { errorMessage } from '../common/result';

/** Operational alerts for the first configured admin. */
@Injectable()
export class AdminAlertService {
  private readonly logger = new Logger(AdminAlertService.name);
  private readonly adminIds: number[];

  constructor(
    configService: ConfigService<AppConfig, true>,
    private readonly messageSender: MessageSender,
  ) {
    this.adminIds = configService.get('telegram', { infer: true }).adminUserIds;
  }

  isAdmin(telegramId: number): boolean {
    return this.adminIds.includes(telegramId);
  }

  getAdminIds(): number[] {
    return [...this.adminIds];
  }

  /** Delivery failures are logged; an alert never fails its caller. */
  async notifyAdmin(message: string): Promise<boolean> {
    const [adminId] = this.adminIds;
    if (adminId === undefined) {
      this.logger.warn(`No admin configured, alert dropped: ${message}`);
      return false;
    }
    try {
      await this.messageSender.sendMessage(adminId, message);
      return true;
    } catch (error) {
      this.logger.error(`Failed to alert admin ${adminId}: ${errorMessage(error)}`);
      return false;
    }
  }
}
