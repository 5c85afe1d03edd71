import { catalogue, EndpointCatalogue, EndpointSpec, tools } from '../src/tools/index.js';
import { toInputSchema } from '../src/tools/schema.js';

const baseSpec: EndpointSpec = {
  name: 'get_attendance_by_subject',
  description: 'Attendance for one subject',
  method: 'GET',
  path: 'education/{subject}/attendance',
  parameters: [
    { name: 'subject', type: 'string', required: true, location: 'path', description: 'Subject ID' },
    { name: 'semester', type: 'string', required: true, location: 'query', description: 'Semester code' },
  ],
  envelope: { kind: 'list' },
  authenticated: true,
  mutating: false,
};

describe('tools', () => {
  it('have unique names', () => {
    const names = tools.map(tool => tool.name);
    expect(names.length).toBeGreaterThan(0);
    expect(new Set(names).size).toBe(tools.length);
  });

  it('covers every supported HEMIS operation', () => {
    expect(catalogue.list().map(spec => spec.name).sort()).toEqual([
      'generate_student_reference',
      'get_all_student_documents',
      'get_employee_statistics',
      'get_student_attendance',
      'get_student_contract',
      'get_student_contract_list',
      'get_student_decrees',
      'get_student_documents',
      'get_student_exams',
      'get_student_gpa_list',
      'get_student_performance',
      'get_student_profile',
      'get_student_references',
      'get_student_resources',
      'get_student_schedule',
      'get_student_semesters',
      'get_student_statistics',
      'get_student_subjects',
      'get_student_subjects_list',
      'get_student_task_list',
      'get_subject_details',
      'get_universities',
      'get_university_profile',
      'get_university_structure',
    ]);
  });

  it('accept an optional language sent as l', () => {
    for (const spec of tools) {
      const language = spec.parameters.find(param => param.name === 'language');
      expect(language).toMatchObject({ wireName: 'l', required: false, default: 'en-US', location: 'query' });
    }
  });

  it('mark only reference generation as mutating', () => {
    expect(tools.filter(spec => spec.mutating).map(spec => spec.name)).toEqual(['generate_student_reference']);
  });

  it('paginate only the task list', () => {
    expect(tools.filter(spec => spec.envelope.kind === 'paginated').map(spec => spec.name)).toEqual([
      'get_student_task_list',
    ]);
  });

  it('serve public statistics without authentication', () => {
    const open = tools.filter(spec => !spec.authenticated).map(spec => spec.path);
    expect(open).toEqual([
      'public/stat-employee',
      'public/stat-structure',
      'public/stat-student',
      'public/universities',
      'public/university-profile',
    ]);
  });
});

describe('EndpointCatalogue', () => {
  it('looks entries up by name', () => {
    const table = new EndpointCatalogue([baseSpec]);
    expect(table.get('get_attendance_by_subject')).toBe(baseSpec);
    expect(table.get('missing')).toBeUndefined();
  });

  it('rejects duplicate tool names', () => {
    expect(() => new EndpointCatalogue([baseSpec, baseSpec])).toThrow(
      "Duplicate catalogue entry for tool 'get_attendance_by_subject'"
    );
  });

  it('rejects a placeholder without a path parameter', () => {
    const spec: EndpointSpec = { ...baseSpec, parameters: baseSpec.parameters.slice(1) };
    expect(() => new EndpointCatalogue([spec])).toThrow(
      "Tool 'get_attendance_by_subject' path placeholder '{subject}' needs a required path parameter"
    );
  });

  it('rejects a path parameter without a placeholder', () => {
    const spec: EndpointSpec = { ...baseSpec, path: 'education/attendance' };
    expect(() => new EndpointCatalogue([spec])).toThrow(
      "Tool 'get_attendance_by_subject' has no placeholder for path parameter 'subject'"
    );
  });

  it('rejects a parameter declared twice', () => {
    const spec: EndpointSpec = {
      ...baseSpec,
      parameters: [...baseSpec.parameters, baseSpec.parameters[1]],
    };
    expect(() => new EndpointCatalogue([spec])).toThrow(
      "Tool 'get_attendance_by_subject' declares parameter 'semester' twice"
    );
  });
});

describe('toInputSchema', () => {
  it('describes the task list arguments', () => {
    const spec = catalogue.get('get_student_task_list');
    expect(spec).toBeDefined();
    if (!spec) return;

    const schema = toInputSchema(spec);
    expect(schema.required).toEqual(['semester']);
    expect(Object.keys(schema.properties)).toEqual(['semester', 'page', 'limit', 'language']);
    expect(schema.properties.page).toEqual({
      type: 'integer',
      description: 'Page number, starting at 0',
      default: 0,
    });
    expect(schema.properties.semester).toEqual({
      type: 'string',
      description: 'Semester code (e.g. "14" for the 4th semester)',
    });
  });
});
