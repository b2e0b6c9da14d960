import { Inject, Injectable, Logger, OnModuleDestroy, OnModuleInit } from '@nestjs/common';
import { Context, Telegraf } from 'telegraf';
import { callbackQuery, message } from 'telegraf/filters';
import { TELEGRAF_BOT } from '../telegram/telegram.constants';
import { ChatSession, TelegrafSession } from './chat-session';
import { StateService } from './state.service';
import { BotCommands } from './constants';
import { homeButton, keyboard } from './keyboards';
import { TextHandler } from './handlers/TextHandler';
import { CallbackHandler } from './handlers/CallbackHandler';
import { DocumentHandler } from './handlers/DocumentHandler';
import { MenuFlow } from './flows/MenuFlow';
import { ProfileFlow } from './flows/ProfileFlow';
import { EnrollmentFlow } from './flows/EnrollmentFlow';
import { AdminPanelFlow } from './flows/AdminPanelFlow';
import { PostingFlow } from './flows/PostingFlow';
import { NotificationAdminFlow } from './flows/NotificationAdminFlow';
import { UploadFlow } from './flows/UploadFlow';
import { PreferencesService } from '../preferences/preferences.service';
import { AdminAlertService } from '../notifications/admin-alert.service';
import { LocalizationService } from '../i18n/localization.service';
import { errorMessage } from '../common/result';

type AdminCommand = (session: ChatSession) => Promise<void>;

@Injectable()
export class BotService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(BotService.name);

  constructor(
    @Inject(TELEGRAF_BOT) private readonly bot: Telegraf,
    private readonly textHandler: TextHandler,
    private readonly callbackHandler: CallbackHandler,
    private readonly documentHandler: DocumentHandler,
    private readonly menuFlow: MenuFlow,
    private readonly profileFlow: ProfileFlow,
    private readonly enrollmentFlow: EnrollmentFlow,
    private readonly adminPanelFlow: AdminPanelFlow,
    private readonly postingFlow: PostingFlow,
    private readonly notificationAdminFlow: NotificationAdminFlow,
    private readonly uploadFlow: UploadFlow,
    private readonly stateService: StateService,
    private readonly preferencesService: PreferencesService,
    private readonly adminAlert: AdminAlertService,
    private readonly i18n: LocalizationService,
  ) {
    this.setupHandlers();
    this.setupErrorHandler();
  }

  private setupHandlers(): void {
    this.bot.start(ctx => this.withSession(ctx, session => this.menuFlow.start(session)));
    this.bot.command('courses', ctx => this.withSession(ctx, session => this.menuFlow.showCourses(session)));
    this.bot.command('register', ctx => this.withSession(ctx, session => this.enrollmentFlow.chooseCourse(session)));
    this.bot.command('materials', ctx => this.withSession(ctx, session => this.menuFlow.showMaterials(session)));
    this.bot.command('language', ctx => this.withSession(ctx, session => this.menuFlow.showLanguage(session)));
    this.bot.command('profile', ctx => this.withSession(ctx, session => this.profileFlow.showProfile(session)));
    this.bot.command('help', ctx => this.withSession(ctx, session => this.menuFlow.showHelp(session)));
    this.bot.command('cancel', ctx => this.withSession(ctx, session => this.cancel(session)));

    this.bot.command('admin', ctx => this.withSession(ctx, this.adminOnly(session => this.adminPanelFlow.showPanel(session))));
    this.bot.command('post', ctx => this.withSession(ctx, this.adminOnly(session => this.postingFlow.start(session))));
    this.bot.command('broadcast', ctx =>
      this.withSession(ctx, this.adminOnly(session => this.notificationAdminFlow.startBroadcast(session))),
    );
    this.bot.command('upload', ctx => this.withSession(ctx, this.adminOnly(session => this.uploadFlow.start(session))));

    this.bot.on(message('document'), ctx =>
      this.withSession(ctx, session =>
        this.documentHandler.handleDocument(session, {
          fileId: ctx.message.document.file_id,
          fileName: ctx.message.document.file_name,
          mimeType: ctx.message.document.mime_type,
          fileSize: ctx.message.document.file_size,
        }),
      ),
    );
    this.bot.on(message('photo'), ctx =>
      this.withSession(ctx, session =>
        this.documentHandler.handlePhoto(
          session,
          ctx.message.photo.map(photo => photo.file_id),
        ),
      ),
    );
    this.bot.on(callbackQuery('data'), ctx =>
      this.withSession(ctx, session => this.callbackHandler.handle(session, ctx.callbackQuery.data)),
    );
    this.bot.on(message('text'), ctx => this.withSession(ctx, session => this.textHandler.handle(session, ctx.message.text)));
  }

  private setupErrorHandler(): void {
    this.bot.catch((error, ctx) => {
      this.logger.error(`Bot error for user ${ctx.from?.id}: ${errorMessage(error)}`, error instanceof Error ? error.stack : undefined);
    });
  }

  private async withSession(ctx: Context, run: (session: ChatSession) => Promise<void>): Promise<void> {
    if (!ctx.from) {
      return;
    }
    const language = await this.preferencesService.getLanguage(ctx.from.id);
    await run(new TelegrafSession(ctx, ctx.from.id, language));
  }

  private adminOnly(command: AdminCommand): AdminCommand {
    return async session => {
      if (!this.adminAlert.isAdmin(session.userId)) {
        await session.reply(this.i18n.t('common.not_admin', session.language));
        return;
      }
      await command(session);
    };
  }

  private async cancel(session: ChatSession): Promise<void> {
    const t = this.i18n.translator(session.language);
    this.stateService.clearState(session.userId);
    await session.reply(t('common.cancelled'), keyboard([[homeButton(t)]]));
  }

  async onModuleInit(): Promise<void> {
    try {
      await this.bot.telegram.setMyCommands([...BotCommands]);
    } catch (error) {
      this.logger.warn(`⚠️ Could not register bot commands: ${errorMessage(error)}`);
    }

    this.bot
      .launch(() => this.logger.log('✅ Bot started successfully!'))
      .catch(error => this.logger.error(`❌ Bot failed to start: ${errorMessage(error)}`));
    this.logger.log('🤖 Bot is starting in background...');
  }

  async onModuleDestroy(): Promise<void> {
    try {
      this.bot.stop();
      this.logger.log('🛑 Bot stopped');
    } catch (error) {
      this.logger.warn(`Bot was not running: ${errorMessage(error)}`);
    }
  }
}
