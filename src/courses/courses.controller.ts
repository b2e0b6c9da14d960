import { Controller, Get, NotFoundException, Param, Query, UseGuards } from '@nestjs/common';
import { ApiHeader, ApiOperation, ApiParam, ApiQuery, ApiResponse, ApiTags } from '@nestjs/swagger';
import { CoursesService } from './courses.service';
import { Course } from './course.entity';
import { API_KEY_HEADER, ApiKeyGuard } from '../common/api-key.guard';

@ApiTags('courses')
@ApiHeader({ name: API_KEY_HEADER, required: true })
@UseGuards(ApiKeyGuard)
@Controller('courses')
export class CoursesController {
  constructor(private readonly coursesService: CoursesService) {}

  @Get()
  @ApiOperation({ summary: 'List courses' })
  @ApiQuery({ name: 'all', required: false, description: 'Include draft, completed and cancelled courses', type: Boolean })
  @ApiResponse({ status: 200, description: 'Courses', type: [Course] })
  async findAll(@Query('all') all?: string) {
    return await this.coursesService.getCourses(all !== 'true');
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get a course by id' })
  @ApiParam({ name: 'id', description: 'Course id (uuid)' })
  @ApiResponse({ status: 200, description: 'Course found', type: Course })
  @ApiResponse({ status: 404, description: 'Course not found' })
  async findOne(@Param('id') id: string) {
    const course = await this.coursesService.getCourseById(id);
    if (!course) {
      throw new NotFoundException(`Course ${id} not found`);
    }
    return course;
  }
}
