import { Injectable } from '@nestjs/common';
import { PreferencesRepository } from './preferences.repository';
import { UserPreferences } from './user-preferences.entity';
import { Language } from '../students/student.entity';
import { StudentsService } from '../students/students.service';

@Injectable()
export class PreferencesService {
  constructor(
    private readonly preferencesRepository: PreferencesRepository,
    private readonly studentsService: StudentsService,
  ) {}

  async getLanguage(telegramId: number): Promise<Language> {
    const preferences = await this.preferencesRepository.findByTelegramId(telegramId);
    return preferences?.language ?? Language.AR;
  }

  /** Stores the choice and mirrors it on the student record when one exists. */
  async setLanguage(telegramId: number, language: Language): Promise<void> {
    await this.preferencesRepository.setLanguage(telegramId, language);
    await this.studentsService.setLanguage(telegramId, language);
  }

  async notificationsEnabled(telegramId: number): Promise<boolean> {
    const preferences = await this.preferencesRepository.findByTelegramId(telegramId);
    return preferences?.notifications_enabled ?? true;
  }

  async setNotifications(telegramId: number, enabled: boolean): Promise<UserPreferences> {
    const preferences =
      (await this.preferencesRepository.findByTelegramId(telegramId)) ?? UserPreferences.create(telegramId);
    preferences.notifications_enabled = enabled;
    return this.preferencesRepository.save(preferences);
  }

  findAll(): Promise<UserPreferences[]> {
    return this.preferencesRepository.findAll();
  }
}
