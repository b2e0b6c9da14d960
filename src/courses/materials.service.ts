import { Injectable, Logger } from '@nestjs/common';
import { CoursesRepository } from './courses.repository';
import { DriveFile, FileStorage } from '../integrations/google/google-drive.adapter';
import { Result, errorMessage, fail, ok } from '../common/result';

export interface UploadedFile {
  content: Buffer;
  fileName: string;
  mimeType: string;
}

export type UploadResult = Result<{ links: string[]; warnings: string[] }>;

@Injectable()
export class MaterialsService {
  private readonly logger = new Logger(MaterialsService.name);

  constructor(
    private readonly coursesRepository: CoursesRepository,
    private readonly fileStorage: FileStorage,
  ) {}

  /** Upload into the default Drive folder (or `folderId`). */
  async uploadFile(file: UploadedFile, folderId?: string): Promise<UploadResult> {
    try {
      const link = await this.fileStorage.uploadFile(file.content, file.fileName, file.mimeType, folderId);
      return ok({ links: [link], warnings: [] });
    } catch (error) {
      this.logger.error(`Upload of ${file.fileName} failed: ${errorMessage(error)}`);
      return fail(errorMessage(error));
    }
  }

  /**
   * Uploads one file into each course's materials folder, creating missing
   * folders on the way. Succeeds when at least one upload went through.
   */
  async uploadToCourses(file: UploadedFile, courseIds: string[]): Promise<UploadResult> {
    if (courseIds.length === 0) {
      return fail('No courses selected');
    }

    const links: string[] = [];
    const warnings: string[] = [];
    for (const courseId of courseIds) {
      const course = await this.coursesRepository.findById(courseId);
      if (!course) {
        warnings.push(`Course ${courseId} not found`);
        continue;
      }

      if (!course.materials_folder_id) {
        try {
          course.materials_folder_id = await this.fileStorage.createFolder(course.name);
          await this.coursesRepository.save(course);
        } catch (error) {
          warnings.push(`Failed to create folder for ${course.name}: ${errorMessage(error)}`);
          continue;
        }
      }

      try {
        links.push(
          await this.fileStorage.uploadFile(file.content, file.fileName, file.mimeType, course.materials_folder_id),
        );
        this.logger.log(`📎 Uploaded ${file.fileName} to course ${course.name}`);
      } catch (error) {
        warnings.push(`Failed to upload to ${course.name}: ${errorMessage(error)}`);
      }
    }

    if (links.length === 0) {
      return fail(warnings.length ? warnings.join('; ') : 'Failed to upload to any course');
    }
    return ok({ links, warnings });
  }

  /** Files in the course folder; empty when the course, folder or Drive is unavailable. */
  async getMaterials(courseId: string): Promise<DriveFile[]> {
    const course = await this.coursesRepository.findById(courseId);
    if (!course?.materials_folder_id) {
      return [];
    }
    try {
      return await this.fileStorage.listFiles(course.materials_folder_id);
    } catch (error) {
      this.logger.error(`Failed to list materials of ${courseId}: ${errorMessage(error)}`);
      return [];
    }
  }

  async deleteMaterial(fileId: string): Promise<Result> {
    try {
      await this.fileStorage.deleteFile(fileId);
      return ok();
    } catch (error) {
      this.logger.error(`Failed to delete ${fileId}: ${errorMessage(error)}`);
      return fail(errorMessage(error));
    }
  }
}
