import { Global, Module } from '@nestjs/common';
import { Clock } from './timezone';
import { LocalizationService } from '../i18n/localization.service';

@Global()
@Module({
  providers: [Clock, LocalizationService],
  exports: [Clock, LocalizationService],
})
export class CommonModule {}
