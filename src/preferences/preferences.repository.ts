import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MongoRepository } from 'typeorm';
import { UserPreferences } from './user-preferences.entity';
import { Language } from '../students/student.entity';
import { toDocument } from '../database/documents';

export abstract class PreferencesRepository {
  abstract findByTelegramId(telegramId: number): Promise<UserPreferences | null>;
  abstract findAll(): Promise<UserPreferences[]>;
  abstract save(preferences: UserPreferences): Promise<UserPreferences>;
  /** Upsert: creates the document with notifications enabled when absent. */
  abstract setLanguage(telegramId: number, language: Language): Promise<void>;
  abstract findAllWithNotifications(): Promise<UserPreferences[]>;
}

@Injectable()
export class MongoPreferencesRepository extends PreferencesRepository {
  constructor(
    @InjectRepository(UserPreferences)
    private readonly repository: MongoRepository<UserPreferences>,
  ) {
    super();
  }

  findByTelegramId(telegramId: number): Promise<UserPreferences | null> {
    return this.repository.findOneBy({ _id: telegramId });
  }

  findAll(): Promise<UserPreferences[]> {
    return this.repository.findBy({});
  }

  async save(preferences: UserPreferences): Promise<UserPreferences> {
    await this.repository.replaceOne(
      { _id: preferences.telegram_id },
      toDocument(preferences, 'telegram_id'),
      { upsert: true },
    );
    return preferences;
  }

  async setLanguage(telegramId: number, language: Language): Promise<void> {
    await this.repository.updateOne(
      { _id: telegramId },
      { $set: { language }, $setOnInsert: { notifications_enabled: true } },
      { upsert: true },
    );
  }

  findAllWithNotifications(): Promise<UserPreferences[]> {
    return this.repository.findBy({ notifications_enabled: true });
  }
}
