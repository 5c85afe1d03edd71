import { EndpointSpec } from './types.js';
import {
  getStudentProfileTool,
  getStudentContractTool,
  getStudentContractListTool,
  getStudentDocumentsTool,
  getAllStudentDocumentsTool,
  getStudentReferencesTool,
  generateStudentReferenceTool,
  getStudentDecreesTool,
} from './student.js';
import {
  getStudentGpaListTool,
  getStudentSemestersTool,
  getStudentSubjectsTool,
  getStudentSubjectsListTool,
  getSubjectDetailsTool,
  getStudentAttendanceTool,
  getStudentPerformanceTool,
  getStudentResourcesTool,
  getStudentTaskListTool,
  getStudentExamsTool,
  getStudentScheduleTool,
} from './education.js';
import {
  getEmployeeStatisticsTool,
  getUniversityStructureTool,
  getStudentStatisticsTool,
  getUniversitiesTool,
  getUniversityProfileTool,
} from './public.js';

export const tools: EndpointSpec[] = [
  getStudentProfileTool,
  getStudentGpaListTool,
  getStudentSemestersTool,
  getStudentSubjectsTool,
  getStudentSubjectsListTool,
  getSubjectDetailsTool,
  getStudentAttendanceTool,
  getStudentPerformanceTool,
  getStudentResourcesTool,
  getStudentTaskListTool,
  getStudentExamsTool,
  getStudentScheduleTool,
  getStudentContractTool,
  getStudentContractListTool,
  getStudentDocumentsTool,
  getAllStudentDocumentsTool,
  getStudentReferencesTool,
  generateStudentReferenceTool,
  getStudentDecreesTool,
  getEmployeeStatisticsTool,
  getUniversityStructureTool,
  getStudentStatisticsTool,
  getUniversitiesTool,
  getUniversityProfileTool,
];

const PLACEHOLDER = /\{(\w+)\}/g;

/**
 * Read-only lookup over endpoint specs. Construction rejects tables with
 * duplicate tools or parameters and path placeholders without a path parameter.
 */
export class EndpointCatalogue {
  private readonly entries = new Map<string, EndpointSpec>();

  constructor(specs: readonly EndpointSpec[]) {
    for (const spec of specs) {
      if (this.entries.has(spec.name)) {
        throw new Error(`Duplicate catalogue entry for tool '${spec.name}'`);
      }
      validateSpec(spec);
      this.entries.set(spec.name, spec);
    }
  }

  get(name: string): EndpointSpec | undefined {
    return this.entries.get(name);
  }

  list(): EndpointSpec[] {
    return [...this.entries.values()];
  }
}

function validateSpec(spec: EndpointSpec): void {
  const names = new Set<string>();
  for (const param of spec.parameters) {
    if (names.has(param.name)) {
      throw new Error(`Tool '${spec.name}' declares parameter '${param.name}' twice`);
    }
    names.add(param.name);
    if (param.location === 'path' && !spec.path.includes(`{${param.name}}`)) {
      throw new Error(`Tool '${spec.name}' has no placeholder for path parameter '${param.name}'`);
    }
  }

  for (const match of spec.path.matchAll(PLACEHOLDER)) {
    const param = spec.parameters.find(p => p.name === match[1]);
    if (!param || param.location !== 'path' || !param.required) {
      throw new Error(
        `Tool '${spec.name}' path placeholder '{${match[1]}}' needs a required path parameter`
      );
    }
  }
}

export const catalogue = new EndpointCatalogue(tools);

export type {
  EndpointSpec,
  ParameterSpec,
  ParameterLocation,
  ParameterType,
  ResponseEnvelope,
  PaginatedEnvelope,
} from './types.js';
