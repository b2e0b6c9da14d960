import { StatisticsService } from './statistics.service';
import { Course, CourseStatus } from '../courses/course.entity';
import { Student } from '../students/student.entity';
import { Registration, RegistrationStatus } from '../registrations/registration.entity';
import { PaymentMethod, PaymentRecord } from '../registrations/payment-record.entity';
import {
  InMemoryCoursesRepository,
  InMemoryPaymentsRepository,
  InMemoryRegistrationsRepository,
  InMemoryStudentsRepository,
} from '../testing/in-memory-repositories';

describe('StatisticsService', () => {
  it('aggregates courses, students, registrations and payments', async () => {
    const courses = new InMemoryCoursesRepository();
    const students = new InMemoryStudentsRepository();
    const registrations = new InMemoryRegistrationsRepository();
    const payments = new InMemoryPaymentsRepository();
    const service = new StatisticsService(courses, students, registrations, payments);

    const newCourse = (status: CourseStatus) =>
      Object.assign(
        Course.create({
          name: 'Networking',
          description: '',
          instructor: 'Fadi',
          start_date: new Date('2024-01-01T00:00:00Z'),
          end_date: new Date('2024-02-01T00:00:00Z'),
          price: 50,
          max_students: 5,
        }),
        { status },
      );
    const open = await courses.save(newCourse(CourseStatus.PUBLISHED));
    await courses.save(newCourse(CourseStatus.COMPLETED));
    const first = await students.save(
      Object.assign(Student.create(1, 'Aya Sami Kassem', '0912345678'), { profile_completed: true }),
    );
    const second = await students.save(Student.create(2, 'Basel Ali Mrad', '0933333333'));
    const approved = await registrations.save(
      Object.assign(Registration.create(first.id, open.id), { status: RegistrationStatus.APPROVED }),
    );
    await registrations.save(Registration.create(second.id, open.id));
    await payments.save(PaymentRecord.create(approved.id, 20, PaymentMethod.CASH, 1001));
    await payments.save(PaymentRecord.create(approved.id, 15, PaymentMethod.CARD, 1001));

    await expect(service.getAdminStatistics()).resolves.toEqual({
      totalCourses: 2,
      availableCourses: 1,
      totalStudents: 2,
      completedProfiles: 1,
      pendingRegistrations: 1,
      approvedRegistrations: 1,
      totalCollected: 35,
    });
  });
});
