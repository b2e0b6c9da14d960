import { Entity, ObjectIdColumn, Column } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { Language } from '../students/student.entity';

/** Keyed by telegram id, so the document `_id` is the telegram id itself. */
@Entity('user_preferences')
export class UserPreferences {
  @ApiProperty()
  @ObjectIdColumn()
  telegram_id!: number;

  @ApiProperty({ enum: Language })
  @Column()
  language!: Language;

  @ApiProperty()
  @Column({ default: true })
  notifications_enabled!: boolean;

  static create(telegramId: number, language: Language = Language.AR): UserPreferences {
    return Object.assign(new UserPreferences(), {
      telegram_id: telegramId,
      language,
      notifications_enabled: true,
    });
  }
}
