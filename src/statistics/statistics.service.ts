import { Injectable } from '@nestjs/common';
import { ApiProperty } from '@nestjs/swagger';
import { CoursesRepository } from '../courses/courses.repository';
import { StudentsRepository } from '../students/students.repository';
import { RegistrationsRepository } from '../registrations/registrations.repository';
import { RegistrationStatus } from '../registrations/registration.entity';
import { PaymentsRepository } from '../registrations/payments.repository';

export class AdminStatistics {
  @ApiProperty()
  totalCourses!: number;

  @ApiProperty({ description: 'Published or ongoing' })
  availableCourses!: number;

  @ApiProperty()
  totalStudents!: number;

  @ApiProperty()
  completedProfiles!: number;

  @ApiProperty()
  pendingRegistrations!: number;

  @ApiProperty()
  approvedRegistrations!: number;

  @ApiProperty({ description: 'Sum of all payment records' })
  totalCollected!: number;
}

@Injectable()
export class StatisticsService {
  constructor(
    private readonly coursesRepository: CoursesRepository,
    private readonly studentsRepository: StudentsRepository,
    private readonly registrationsRepository: RegistrationsRepository,
    private readonly paymentsRepository: PaymentsRepository,
  ) {}

  async getAdminStatistics(): Promise<AdminStatistics> {
    const [courses, students, pending, approved, totalCollected] = await Promise.all([
      this.coursesRepository.findAll(),
      this.studentsRepository.findAll(),
      this.registrationsRepository.findByStatus(RegistrationStatus.PENDING),
      this.registrationsRepository.findByStatus(RegistrationStatus.APPROVED),
      this.paymentsRepository.getTotalCollected(),
    ]);

    return {
      totalCourses: courses.length,
      availableCourses: courses.filter(course => course.isAvailable()).length,
      totalStudents: students.length,
      completedProfiles: students.filter(student => student.profile_completed).length,
      pendingRegistrations: pending.length,
      approvedRegistrations: approved.length,
      totalCollected,
    };
  }
}
