import { Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import fetch from 'node-fetch';
import { AppConfig, WhatsAppConfig } from '../../config/configuration';
import { errorMessage } from '../../common/result';
import { GRAPH_API_BASE } from '../meta/meta-graph.adapter';

export abstract class OtpSender {
  /** False when the messaging channel is not configured; callers skip verification. */
  abstract isEnabled(): boolean;
  abstract sendOtp(phone: string, code: string): Promise<boolean>;
}

/** `09XXXXXXXX` → `9639XXXXXXXX`, the form the Cloud API expects. */
export function formatPhoneForWhatsApp(phone: string): string {
  const digits = phone.replace(/\D/g, '');
  return digits.startsWith('0') ? `963${digits.slice(1)}` : digits;
}

@Injectable()
export class WhatsAppAdapter extends OtpSender {
  private readonly logger = new Logger(WhatsAppAdapter.name);
  private readonly config: WhatsAppConfig;

  constructor(configService: ConfigService<AppConfig, true>) {
    super();
    this.config = configService.get('whatsapp', { infer: true });
  }

  isEnabled(): boolean {
    return Boolean(this.config.phoneNumberId && this.config.accessToken);
  }

  sendOtp(phone: string, code: string): Promise<boolean> {
    return this.sendTemplate(formatPhoneForWhatsApp(phone), this.config.otpTemplate, [code]);
  }

  async sendTemplate(to: string, template: string, params: string[], language = 'ar'): Promise<boolean> {
    const components = params.length
      ? [{ type: 'body', parameters: params.map(text => ({ type: 'text', text })) }]
      : [];

    try {
      const response = await fetch(`${GRAPH_API_BASE}/${this.config.phoneNumberId}/messages`, {
        method: 'POST',
        headers: {
          Authorization: `Bearer ${this.config.accessToken}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          messaging_product: 'whatsapp',
          to,
          type: 'template',
          template: { name: template, language: { code: language }, components },
        }),
      });

      if (!response.ok) {
        this.logger.error(`WhatsApp API error: ${response.status} - ${await response.text()}`);
        return false;
      }
      this.logger.log(`📲 WhatsApp template ${template} sent to ${to}`);
      return true;
    } catch (error) {
      this.logger.error(`Failed to send WhatsApp message: ${errorMessage(error)}`);
      return false;
    }
  }
}
