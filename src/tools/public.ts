import { language } from './parameters.js';
import { EndpointSpec } from './types.js';

// Public statistics; HEMIS serves these without a token.

export const getEmployeeStatisticsTool: EndpointSpec = {
  name: 'get_employee_statistics',
  description: 'Get statistics about university employees by position, gender, degree and rank',
  method: 'GET',
  path: 'public/stat-employee',
  parameters: [language],
  envelope: { kind: 'object' },
  authenticated: false,
  mutating: false,
};

export const getUniversityStructureTool: EndpointSpec = {
  name: 'get_university_structure',
  description: 'Get the structure of the university (faculties, departments, units)',
  method: 'GET',
  path: 'public/stat-structure',
  parameters: [language],
  envelope: { kind: 'object' },
  authenticated: false,
  mutating: false,
};

export const getStudentStatisticsTool: EndpointSpec = {
  name: 'get_student_statistics',
  description: 'Get statistics about the students of the university',
  method: 'GET',
  path: 'public/stat-student',
  parameters: [language],
  envelope: { kind: 'object' },
  authenticated: false,
  mutating: false,
};

export const getUniversitiesTool: EndpointSpec = {
  name: 'get_universities',
  description: 'Get the universities that use the HEMIS system',
  method: 'GET',
  path: 'public/universities',
  parameters: [language],
  envelope: { kind: 'list' },
  authenticated: false,
  mutating: false,
};

export const getUniversityProfileTool: EndpointSpec = {
  name: 'get_university_profile',
  description: 'Get profile information about the university',
  method: 'GET',
  path: 'public/university-profile',
  parameters: [language],
  envelope: { kind: 'object' },
  authenticated: false,
  mutating: false,
};
