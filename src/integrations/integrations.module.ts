import { Global, Module } from '@nestjs/common';
import { FileStorage, GoogleDriveAdapter } from './google/google-drive.adapter';
import { GoogleSheetsAdapter, PostSource } from './google/google-sheets.adapter';
import { MetaGraphAdapter, SocialPublisher } from './meta/meta-graph.adapter';
import { OtpSender, WhatsAppAdapter } from './whatsapp/whatsapp.adapter';

const ADAPTERS = [
  { provide: FileStorage, useClass: GoogleDriveAdapter },
  { provide: PostSource, useClass: GoogleSheetsAdapter },
  { provide: SocialPublisher, useClass: MetaGraphAdapter },
  { provide: OtpSender, useClass: WhatsAppAdapter },
];

@Global()
@Module({
  providers: ADAPTERS,
  exports: ADAPTERS.map(adapter => adapter.provide),
})
export class IntegrationsModule {}
