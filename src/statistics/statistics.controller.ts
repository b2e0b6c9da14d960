import { Controller, Get, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AdminStatistics, StatisticsService } from './statistics.service';
import { API_KEY_HEADER, ApiKeyGuard } from '../common/api-key.guard';

@ApiTags('statistics')
@ApiHeader({ name: API_KEY_HEADER, required: true })
@UseGuards(ApiKeyGuard)
@Controller('statistics')
export class StatisticsController {
  constructor(private readonly statisticsService: StatisticsService) {}

  @Get()
  @ApiOperation({ summary: 'Course, student, registration and payment totals' })
  @ApiResponse({ status: 200, description: 'Admin statistics', type: AdminStatistics })
  async getAdminStatistics() {
    return await this.statisticsService.getAdminStatistics();
  }
}
