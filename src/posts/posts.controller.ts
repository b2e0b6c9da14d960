import { Controller, HttpCode, Post, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { PostSchedulerService } from './post-scheduler.service';
import { API_KEY_HEADER, ApiKeyGuard } from '../common/api-key.guard';

@ApiTags('posts')
@ApiHeader({ name: API_KEY_HEADER, required: true })
@UseGuards(ApiKeyGuard)
@Controller('posts')
export class PostsController {
  constructor(private readonly postScheduler: PostSchedulerService) {}

  @Post('check')
  @HttpCode(200)
  @ApiOperation({ summary: 'Publish every due post from the sheet now' })
  @ApiResponse({ status: 200, description: 'Number of posts published by this check' })
  async check() {
    return { published: await this.postScheduler.triggerNow() };
  }
}
