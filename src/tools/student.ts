import { language } from './parameters.js';
import { EndpointSpec } from './types.js';

export const getStudentProfileTool: EndpointSpec = {
  name: 'get_student_profile',
  description: 'Get your personal and academic information from HEMIS',
  method: 'GET',
  path: 'account/me',
  parameters: [language],
  envelope: { kind: 'object' },
  authenticated: true,
  mutating: false,
};

export const getStudentContractTool: EndpointSpec = {
  name: 'get_student_contract',
  description: 'Get your current tuition contract from HEMIS',
  method: 'GET',
  path: 'student/contract',
  parameters: [language],
  envelope: { kind: 'object' },
  authenticated: true,
  mutating: false,
};

export const getStudentContractListTool: EndpointSpec = {
  name: 'get_student_contract_list',
  description: 'Get all tuition contracts in your student record',
  method: 'GET',
  path: 'student/contract-list',
  parameters: [language],
  envelope: { kind: 'object' },
  authenticated: true,
  mutating: false,
};

export const getStudentDocumentsTool: EndpointSpec = {
  name: 'get_student_documents',
  description: 'Get your student documents from HEMIS',
  method: 'GET',
  path: 'student/document',
  parameters: [language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

export const getAllStudentDocumentsTool: EndpointSpec = {
  name: 'get_all_student_documents',
  description: 'Get every document in your student record, grouped by type',
  method: 'GET',
  path: 'student/document-all',
  parameters: [language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

export const getStudentReferencesTool: EndpointSpec = {
  name: 'get_student_references',
  description: 'Get the references/certificates issued to you',
  method: 'GET',
  path: 'student/reference',
  parameters: [language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

// HEMIS exposes this as a GET, but every call issues a new reference.
export const generateStudentReferenceTool: EndpointSpec = {
  name: 'generate_student_reference',
  description: 'Generate a new student reference/certificate',
  method: 'GET',
  path: 'student/reference-generate',
  parameters: [language],
  envelope: { kind: 'object' },
  authenticated: true,
  mutating: true,
};

export const getStudentDecreesTool: EndpointSpec = {
  name: 'get_student_decrees',
  description: 'Get the university decrees that concern you',
  method: 'GET',
  path: 'student/decree',
  parameters: [language],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};
