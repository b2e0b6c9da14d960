import { Module } from '@nestjs/common';
import { CoursesService } from './courses.service';
import { MaterialsService } from './materials.service';
import { CoursesController } from './courses.controller';

@Module({
  providers: [CoursesService, MaterialsService],
  controllers: [CoursesController],
  exports: [CoursesService, MaterialsService],
})
export class CoursesModule {}
