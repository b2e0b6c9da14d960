import { Course } from '../courses/course.entity';
import { Student } from '../students/student.entity';
import { Registration } from '../registrations/registration.entity';
import { Translate } from '../i18n/localization.service';
import { Clock } from '../common/timezone';
import { formatPhoneDisplay } from '../common/phone';

export const DIVIDER = '━━━━━━━━━━━━━━━━━━━━';

export function formatAmount(value: number): string {
  return value.toLocaleString('en-US');
}

export function courseCard(course: Course, t: Translate, clock: Clock): string {
  const lines = [`📚 ${course.name}`, DIVIDER];
  if (course.description) {
    lines.push(course.description, '');
  }
  lines.push(
    `👨‍🏫 ${t('courses.instructor')}: ${course.instructor}`,
    `📅 ${t('courses.dates')}: ${clock.format(course.start_date, false)} → ${clock.format(course.end_date, false)}`,
    `💰 ${t('courses.price')}: ${formatAmount(course.price)}`,
    `👥 ${t('courses.max_students')}: ${course.max_students}`,
  );
  if (course.duration_hours) {
    lines.push(`⏱ ${t('courses.duration')}: ${t('courses.hours', { hours: course.duration_hours })}`);
  }
  if (course.target_audience) {
    lines.push(`🎯 ${t('courses.target_audience')}: ${course.target_audience}`);
  }
  return lines.join('\n');
}

export function studentSummary(student: Student, t: Translate): string {
  const lines = [
    `👤 ${student.full_name}`,
    `📱 ${formatPhoneDisplay(student.phone_number)}${student.phone_verified ? ' ✅' : ''}`,
  ];
  if (student.gender) lines.push(`${t('profile.fields.gender')}: ${t(`profile.gender.${student.gender}`)}`);
  if (student.age !== undefined) lines.push(`${t('profile.fields.age')}: ${student.age}`);
  if (student.residence) lines.push(`${t('profile.fields.residence')}: ${student.residence}`);
  if (student.education_level) {
    lines.push(`${t('profile.fields.education')}: ${t(`profile.education.${student.education_level}`)}`);
  }
  if (student.specialization) lines.push(`${t('profile.fields.specialization')}: ${student.specialization}`);
  return lines.join('\n');
}

export function registrationStatusLine(registration: Registration, t: Translate): string {
  return `${t(`status.registration.${registration.status}`)} · ${t(`status.payment.${registration.payment_status}`)}`;
}
