import { Entity, ObjectIdColumn, Column, Index } from 'typeorm';
import { ApiProperty } from '@nestjs/swagger';
import { v4 as uuidv4 } from 'uuid';

export enum Gender {
  MALE = 'male',
  FEMALE = 'female',
}

export enum EducationLevel {
  MIDDLE_SCHOOL = 'middle_school',
  HIGH_SCHOOL = 'high_school',
  DIPLOMA = 'diploma',
  BACHELOR = 'bachelor',
  MASTER = 'master',
  PHD = 'phd',
  OTHER = 'other',
}

export enum Language {
  AR = 'ar',
  EN = 'en',
}

/** Levels after which the student is asked for a specialization. */
export const SPECIALIZED_EDUCATION_LEVELS: readonly EducationLevel[] = [
  EducationLevel.DIPLOMA,
  EducationLevel.BACHELOR,
  EducationLevel.MASTER,
  EducationLevel.PHD,
];

export interface StudentProfile {
  full_name: string;
  phone_number: string;
  phone_verified: boolean;
  gender?: Gender;
  age?: number;
  residence?: string;
  education_level?: EducationLevel;
  specialization?: string;
}

@Entity('students')
export class Student {
  @ApiProperty({ description: 'Unique identifier (uuid)' })
  @ObjectIdColumn()
  id!: string;

  @ApiProperty({ description: 'Telegram user id' })
  @Index({ unique: true })
  @Column()
  telegram_id!: number;

  @ApiProperty({ description: 'Full name, at least three words' })
  @Column()
  full_name!: string;

  @ApiProperty({ description: 'Normalized phone, 09XXXXXXXX' })
  @Column()
  phone_number!: string;

  @ApiProperty()
  @Column({ default: false })
  phone_verified!: boolean;

  @ApiProperty({ enum: Gender, required: false })
  @Column({ nullable: true })
  gender?: Gender;

  @ApiProperty({ required: false })
  @Column({ nullable: true })
  age?: number;

  @ApiProperty({ required: false })
  @Column({ nullable: true })
  residence?: string;

  @ApiProperty({ enum: EducationLevel, required: false })
  @Column({ nullable: true })
  education_level?: EducationLevel;

  @ApiProperty({ required: false })
  @Column({ nullable: true })
  specialization?: string;

  @ApiProperty()
  @Column({ default: false })
  profile_completed!: boolean;

  @ApiProperty({ enum: Language })
  @Column()
  language!: Language;

  @ApiProperty()
  @Column()
  registered_at!: Date;

  @ApiProperty()
  @Column()
  updated_at!: Date;

  static create(
    telegramId: number,
    fullName: string,
    phoneNumber: string,
    language: Language = Language.AR,
    now: Date = new Date(),
  ): Student {
    return Object.assign(new Student(), {
      id: uuidv4(),
      telegram_id: telegramId,
      full_name: fullName,
      phone_number: phoneNumber,
      phone_verified: false,
      profile_completed: false,
      language,
      registered_at: now,
      updated_at: now,
    });
  }
}
