import { ParameterSpec } from './types.js';

export const language: ParameterSpec = {
  name: 'language',
  wireName: 'l',
  type: 'string',
  required: false,
  location: 'query',
  default: 'en-US',
  description: 'Language for the response (e.g. en-US, uz-UZ, ru-RU)',
};

export const semester: ParameterSpec = {
  name: 'semester',
  type: 'string',
  required: true,
  location: 'query',
  description: 'Semester code (e.g. "14" for the 4th semester)',
};

export const subject: ParameterSpec = {
  name: 'subject',
  type: 'string',
  required: true,
  location: 'query',
  description: 'Subject ID as returned by get_student_subjects_list',
};
