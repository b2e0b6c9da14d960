import { Module } from '@nestjs/common';
import { RegistrationsService } from './registrations.service';
import { PaymentsService } from './payments.service';
import { RegistrationsController } from './registrations.controller';

@Module({
  providers: [RegistrationsService, PaymentsService],
  controllers: [RegistrationsController],
  exports: [RegistrationsService, PaymentsService],
})
export class RegistrationsModule {}
