export enum CallbackPrefix {
  NAV = 'nav_',
  ADMIN = 'admin_',
  COURSE_MANAGER = 'cmgr_',
  PAYMENT = 'pay_',
  STUDENT_VIEW = 'stdview_',
  REGISTRATION_ADMIN = 'regadm_',
  PROFILE = 'profile_',
  STUDENT_REGISTRATION = 'stdreg_',
  ADMIN_NOTIFY = 'adnotif_',
  POST_PLATFORM = 'postplat_',
  COURSE_CREATION = 'ccreate_',
  UPLOAD_SELECTION = 'upsel_',
}

export enum NavAction {
  MAIN = 'main',
  HELP = 'help',
  LANGUAGE = 'language',
  SET_LANGUAGE = 'setlang',
  NOTIFICATIONS = 'notif',
  COURSES = 'courses',
  COURSE = 'course',
  REGISTER = 'register',
  ENROLL = 'enroll',
  MATERIALS = 'materials',
  MATERIAL = 'mat',
  MY_REGISTRATIONS = 'myregs',
}

export enum AdminAction {
  PANEL = 'panel',
  GUIDE = 'guide',
  STATS = 'stats',
  POST = 'post',
  BROADCAST = 'broadcast',
  UPLOAD = 'upload',
  REGISTRATIONS = 'registrations',
  PAYMENTS = 'payments',
  STUDENTS = 'students',
  COURSES = 'courses',
  NOTIFY = 'notify',
  NEW_COURSE = 'newcourse',
  CHECK_POSTS = 'checkposts',
}

export enum CourseManagerAction {
  VIEW = 'view',
  EDIT = 'edit',
  EDIT_FIELD = 'ef',
  STATUS = 'status',
  SET_STATUS = 'st',
  FILES = 'files',
  UPLOAD = 'upload',
  DELETE_FILES = 'delfiles',
  DELETE_FILE = 'delf',
}

export enum PaymentAction {
  LIST = 'list',
  STUDENT = 'student',
  ADD = 'add',
  METHOD = 'method',
  HISTORY = 'history',
  CANCEL = 'cancel',
}

export enum StudentViewAction {
  ALL = 'all',
  PAGE = 'page',
  VIEW = 'view',
  SEARCH_NAME = 'search_name',
  SEARCH_PHONE = 'search_phone',
  COURSE = 'course',
  COURSES = 'courses',
}

export enum RegistrationAdminAction {
  LIST = 'list',
  VIEW = 'view',
  APPROVE = 'approve',
  REJECT = 'reject',
}

export enum ProfileAction {
  START = 'start',
  GENDER = 'gender',
  EDUCATION = 'edu',
  CONFIRM = 'confirm',
  CANCEL = 'cancel',
  VIEW = 'view',
  OTP_RESEND = 'otp_resend',
  OTP_CHANGE_PHONE = 'otp_change_phone',
  EDIT = 'edit',
  EDIT_EDUCATION = 'setedu',
}

export enum StudentRegistrationAction {
  COURSE = 'course',
  CONFIRM = 'confirm',
  CANCEL = 'cancel',
}

export enum NotifyAction {
  TYPE = 'type',
  RECIPIENTS = 'recipients',
  SEND = 'send',
  CANCEL = 'cancel',
}

export enum CourseCreationAction {
  CONFIRM = 'confirm',
  CANCEL = 'cancel',
}

export enum UploadSelectionAction {
  TOGGLE = 'toggle',
  DONE = 'done',
}

export const STUDENTS_PER_PAGE = 10;
export const FILE_SIZE_LIMIT = 20 * 1024 * 1024; // Bot API download limit

/** Profile steps in the order they are asked. */
export const PROFILE_STEP_NUMBERS = {
  full_name: 1,
  phone: 2,
  otp: 2,
  gender: 3,
  age: 4,
  residence: 5,
  education: 6,
  specialization: 7,
  confirm: 8,
} as const;

export type ProfileStep = keyof typeof PROFILE_STEP_NUMBERS;

export const PROFILE_TOTAL_STEPS = 8;

export const BotCommands = [
  { command: 'start', description: 'Main menu' },
  { command: 'courses', description: 'Available courses' },
  { command: 'register', description: 'Register for a course' },
  { command: 'materials', description: 'Course materials' },
  { command: 'profile', description: 'My profile' },
  { command: 'language', description: 'Change language' },
  { command: 'cancel', description: 'Cancel the current action' },
] as const;
