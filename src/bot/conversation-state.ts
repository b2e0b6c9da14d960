import { ProfileStep } from './constants';
import { EducationLevel, StudentProfile } from '../students/student.entity';
import { EditableCourseField } from '../courses/courses.service';
import { NotificationType } from '../notifications/notification-format';
import { RecipientTarget } from '../notifications/notifications.service';
import { PostPlatform } from '../posts/scheduled-post.entity';

export type CourseCreationStep =
  | 'name'
  | 'description'
  | 'instructor'
  | 'start_date'
  | 'end_date'
  | 'price'
  | 'max_students'
  | 'target_audience'
  | 'duration_hours'
  | 'confirm';

export const COURSE_CREATION_STEPS: readonly CourseCreationStep[] = [
  'name',
  'description',
  'instructor',
  'start_date',
  'end_date',
  'price',
  'max_students',
  'target_audience',
  'duration_hours',
  'confirm',
];

/** Course fields as typed by the admin, parsed on confirmation. */
export interface CourseDraft {
  name?: string;
  description?: string;
  instructor?: string;
  start_date?: Date;
  end_date?: Date;
  price?: number;
  max_students?: number;
  target_audience?: string;
  duration_hours?: number;
}

export type ProfileEditField = 'name' | 'phone' | 'residence' | 'education';

export type ConversationState =
  | { kind: 'profile'; step: ProfileStep; draft: Partial<StudentProfile>; courseId?: string }
  /** `pendingPhone` is set while the new number waits for its code; `education` while its specialization is asked. */
  | { kind: 'profileEdit'; field: ProfileEditField; pendingPhone?: string; education?: EducationLevel }
  | { kind: 'registration'; courseId: string }
  | { kind: 'courseCreation'; step: CourseCreationStep; draft: CourseDraft }
  | { kind: 'courseEdit'; courseId: string; field: EditableCourseField }
  | { kind: 'paymentAmount'; registrationId: string; amount?: number }
  | { kind: 'notificationContent'; type: NotificationType; target?: RecipientTarget; content?: string }
  | { kind: 'studentSearch'; by: 'name' | 'phone' }
  | { kind: 'broadcast' }
  | { kind: 'postContent' }
  | { kind: 'postPlatform'; content: string }
  | { kind: 'postImage'; content: string; platform: PostPlatform }
  | { kind: 'uploadSelection'; courseIds: string[] }
  | { kind: 'uploadFile'; courseIds: string[] }
  | { kind: 'courseFileUpload'; courseId: string };

export type ConversationKind = ConversationState['kind'];

export type StateOf<K extends ConversationKind> = Extract<ConversationState, { kind: K }>;
