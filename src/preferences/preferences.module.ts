import { Module } from '@nestjs/common';
import { PreferencesService } from './preferences.service';
import { StudentsModule } from '../students/students.module';

@Module({
  imports: [StudentsModule],
  providers: [PreferencesService],
  exports: [PreferencesService],
})
export class PreferencesModule {}
