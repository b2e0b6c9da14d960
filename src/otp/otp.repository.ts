import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { MongoRepository } from 'typeorm';
import { OtpCode } from './otp-code.entity';
import { toDocument } from '../database/documents';

export abstract class OtpRepository {
  abstract find(telegramId: number): Promise<OtpCode | null>;
  abstract save(otp: OtpCode): Promise<OtpCode>;
  abstract delete(telegramId: number): Promise<void>;
}

@Injectable()
export class MongoOtpRepository extends OtpRepository {
  constructor(
    @InjectRepository(OtpCode)
    private readonly repository: MongoRepository<OtpCode>,
  ) {
    super();
  }

  find(telegramId: number): Promise<OtpCode | null> {
    return this.repository.findOneBy({ _id: telegramId });
  }

  async save(otp: OtpCode): Promise<OtpCode> {
    await this.repository.replaceOne({ _id: otp.telegram_id }, toDocument(otp, 'telegram_id'), { upsert: true });
    return otp;
  }

  async delete(telegramId: number): Promise<void> {
    await this.repository.deleteOne({ _id: telegramId });
  }
}
