import { language, semester, subject } from './parameters.js';
import { EndpointSpec } from './types.js';

export const getStudentGpaListTool: EndpointSpec = {
  name: 'get_student_gpa_list',
  description: 'Get your GPA information across academic years from HEMIS',
  method: 'GET',
  path: 'education/gpa-list',
  parameters: [language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

export const getStudentSemestersTool: EndpointSpec = {
  name: 'get_student_semesters',
  description: 'Get your semesters and their weeks across academic years from HEMIS',
  method: 'GET',
  path: 'education/semesters',
  parameters: [language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

export const getStudentSubjectsTool: EndpointSpec = {
  name: 'get_student_subjects',
  description: 'Get your subjects and grades for a specific semester from HEMIS',
  method: 'GET',
  path: 'education/subject-list',
  parameters: [semester, language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

export const getStudentSubjectsListTool: EndpointSpec = {
  name: 'get_student_subjects_list',
  description: 'Get your subjects for a specific semester from HEMIS, without grades',
  method: 'GET',
  path: 'education/subjects',
  parameters: [semester, language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

export const getSubjectDetailsTool: EndpointSpec = {
  name: 'get_subject_details',
  description: 'Get detailed information about one subject in a semester, including grades by exam',
  method: 'GET',
  path: 'education/subject',
  parameters: [subject, semester, language],
  envelope: { kind: 'object' },
  authenticated: true,
  mutating: false,
};

export const getStudentAttendanceTool: EndpointSpec = {
  name: 'get_student_attendance',
  description: 'Get your attendance records for a subject in a semester from HEMIS',
  method: 'GET',
  path: 'education/attendance',
  parameters: [subject, semester, language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

export const getStudentPerformanceTool: EndpointSpec = {
  name: 'get_student_performance',
  description: 'Get your performance (task submissions and marks) for a subject in a semester',
  method: 'GET',
  path: 'education/performance',
  parameters: [subject, semester, language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

export const getStudentResourcesTool: EndpointSpec = {
  name: 'get_student_resources',
  description: 'Get learning resources (files and links) for a subject in a semester',
  method: 'GET',
  path: 'education/resources',
  parameters: [subject, semester, language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

export const getStudentTaskListTool: EndpointSpec = {
  name: 'get_student_task_list',
  description: 'Get your tasks/assignments for a specific semester, one page at a time',
  method: 'GET',
  path: 'education/task-list',
  parameters: [
    semester,
    {
      name: 'page',
      type: 'integer',
      required: false,
      location: 'query',
      default: 0,
      description: 'Page number, starting at 0',
    },
    {
      name: 'limit',
      type: 'integer',
      required: false,
      location: 'query',
      default: 10,
      description: 'Number of tasks per page',
    },
    language,
  ],
  envelope: {
    kind: 'paginated',
    itemsKey: 'items',
    paginationKey: 'pagination',
    pageParam: 'page',
    limitParam: 'limit',
  },
  authenticated: true,
  mutating: false,
};

export const getStudentExamsTool: EndpointSpec = {
  name: 'get_student_exams',
  description: 'Get your exam timetable for a specific semester from HEMIS',
  method: 'GET',
  path: 'education/exam-table',
  parameters: [semester, language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

export const getStudentScheduleTool: EndpointSpec = {
  name: 'get_student_schedule',
  description: 'Get your class schedule for a semester; the current week unless a week is given',
  method: 'GET',
  path: 'education/schedule',
  parameters: [
    semester,
    {
      name: 'week',
      type: 'string',
      required: false,
      location: 'query',
      description: 'Week ID from get_student_semesters',
    },
    language,
  ],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};
