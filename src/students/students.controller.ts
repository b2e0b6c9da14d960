import { Controller, DefaultValuePipe, Get, NotFoundException, Param, ParseIntPipe, Query, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { StudentsService } from './students.service';
import { API_KEY_HEADER, ApiKeyGuard } from '../common/api-key.guard';

const PAGE_SIZE = 20;

@ApiTags('students')
@ApiHeader({ name: API_KEY_HEADER, required: true })
@UseGuards(ApiKeyGuard)
@Controller('students')
export class StudentsController {
  constructor(private readonly studentsService: StudentsService) {}

  @Get()
  @ApiOperation({ summary: 'List students by name' })
  @ApiQuery({ name: 'page', required: false, description: 'Zero-based page', type: Number })
  @ApiResponse({ status: 200, description: 'One page of students' })
  async list(@Query('page', new DefaultValuePipe(0), ParseIntPipe) page: number) {
    return await this.studentsService.listPage(page, PAGE_SIZE);
  }

  @Get(':telegramId/profile')
  @ApiOperation({ summary: 'Student profile with registrations and payment totals' })
  @ApiParam({ name: 'telegramId', description: 'Telegram user id', type: Number })
  @ApiResponse({ status: 200, description: 'Profile found' })
  @ApiResponse({ status: 404, description: 'Student not found' })
  async getProfile(@Param('telegramId', ParseIntPipe) telegramId: number) {
    const result = await this.studentsService.getProfile(telegramId);
    if (!result.success) {
      throw new NotFoundException(result.error);
    }
    return { student: result.student, courses: result.courses };
  }
}
