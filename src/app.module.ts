import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ScheduleModule } from '@nestjs/schedule';
import configuration, { AppConfig, validateEnv } from './config/configuration';
import { CommonModule } from './common/common.module';
import { DatabaseModule, ENTITIES } from './database/database.module';
import { IntegrationsModule } from './integrations/integrations.module';
import { TelegramModule } from './telegram/telegram.module';
import { CoursesModule } from './courses/courses.module';
import { StudentsModule } from './students/students.module';
import { RegistrationsModule } from './registrations/registrations.module';
import { PostsModule } from './posts/posts.module';
import { StatisticsModule } from './statistics/statistics.module';
import { BotModule } from './bot/bot.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [configuration], validate: validateEnv }),
    ScheduleModule.forRoot(),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AppConfig, true>) => {
        const mongodb = configService.get('mongodb', { infer: true });
        return {
          type: 'mongodb',
          url: mongodb.uri,
          database: mongodb.database,
          entities: ENTITIES,
          synchronize: true,
        };
      },
    }),
    CommonModule,
    DatabaseModule,
    IntegrationsModule,
    TelegramModule,
    CoursesModule,
    StudentsModule,
    RegistrationsModule,
    PostsModule,
    StatisticsModule,
    BotModule,
  ],
})
export class AppModule {}
