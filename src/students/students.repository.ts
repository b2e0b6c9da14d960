import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MongoRepository } from 'typeorm';
import { Student } from './student.entity';
import { escapeRegex, toDocument } from '../database/documents';

export abstract class StudentsRepository {
  abstract findById(id: string): Promise<Student | null>;
  abstract findByTelegramId(telegramId: number): Promise<Student | null>;
  abstract findAll(): Promise<Student[]>;
  /** Case-insensitive substring match on the full name. */
  abstract searchByName(query: string): Promise<Student[]>;
  abstract searchByPhone(query: string): Promise<Student[]>;
  abstract save(student: Student): Promise<Student>;
  abstract delete(id: string): Promise<boolean>;
}

export const byName = (a: Student, b: Student) => a.full_name.localeCompare(b.full_name);

@Injectable()
export class MongoStudentsRepository extends StudentsRepository {
  constructor(
    @InjectRepository(Student)
    private readonly repository: MongoRepository<Student>,
  ) {
    super();
  }

  findById(id: string): Promise<Student | null> {
    return this.repository.findOneBy({ _id: id });
  }

  findByTelegramId(telegramId: number): Promise<Student | null> {
    return this.repository.findOneBy({ telegram_id: telegramId });
  }

  async findAll(): Promise<Student[]> {
    const students = await this.repository.findBy({});
    return students.sort(byName);
  }

  async searchByName(query: string): Promise<Student[]> {
    const students = await this.repository.findBy({
      full_name: { $regex: escapeRegex(query.trim()), $options: 'i' },
    });
    return students.sort(byName);
  }

  async searchByPhone(query: string): Promise<Student[]> {
    const students = await this.repository.findBy({
      phone_number: { $regex: escapeRegex(query.replace(/\s/g, '')) },
    });
    return students.sort(byName);
  }

  async save(student: Student): Promise<Student> {
    await this.repository.replaceOne({ _id: student.id }, toDocument(student, 'id'), { upsert: true });
    return student;
  }

  async delete(id: string): Promise<boolean> {
    const result = await this.repository.deleteOne({ _id: id });
    return result.deletedCount > 0;
  }
}
