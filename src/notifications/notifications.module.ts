import { Module } from '@nestjs/common';
import { NotificationsService } from './notifications.service';
import { AdminAlertService } from './admin-alert.service';

@Module({
  providers: [NotificationsService, AdminAlertService],
  exports: [NotificationsService, AdminAlertService],
})
export class NotificationsModule {}
