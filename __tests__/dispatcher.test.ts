import { createDispatcher } from '../src/dispatcher.js';
import { tools } from '../src/tools/index.js';
import { FakeHemis, ok, testConfig, unauthorized } from './helpers/fakeHemis.js';

const profile = {
  first_name: 'Test',
  second_name: 'Student',
  student_id_number: '000000000001',
  group: { name: 'TEST-01' },
};

function setup(hemis: FakeHemis) {
  return createDispatcher(testConfig, { adapter: hemis.adapter });
}

describe('Dispatcher.invoke', () => {
  it('reports an unknown tool without calling HEMIS', async () => {
    const hemis = new FakeHemis();

    const result = await setup(hemis).invoke('get_grades', {});

    expect(result).toEqual({ status: 'failure', errorKind: 'UnknownTool', message: 'Unknown tool: get_grades' });
    expect(hemis.requests).toHaveLength(0);
  });

  it('reports each missing required parameter without calling HEMIS', async () => {
    const hemis = new FakeHemis();
    const dispatcher = setup(hemis);
    let checked = 0;

    for (const spec of tools) {
      const required = spec.parameters.filter(param => param.required);
      for (const omitted of required) {
        const args = Object.fromEntries(
          required.filter(param => param !== omitted).map(param => [param.name, '1'])
        );
        const result = await dispatcher.invoke(spec.name, args);
        expect(result).toEqual({
          status: 'failure',
          errorKind: 'InvalidArguments',
          message: `Missing required parameter '${omitted.name}' for tool '${spec.name}'`,
        });
        checked += 1;
      }
    }

    expect(checked).toBe(13);
    expect(hemis.requests).toHaveLength(0);
  });

  it('attaches the bearer token and unwraps the profile', async () => {
    const now = 1_700_000_000_000;
    const hemis = new FakeHemis()
      .on('auth/login', () => ok({ token: 'abc', expiresAt: now / 1000 + 3600 }))
      .on('account/me', () => ok(profile));
    const dispatcher = createDispatcher(
      { ...testConfig, login: '123412341234', secret: '12345678' },
      { adapter: hemis.adapter, now: () => now }
    );

    const result = await dispatcher.invoke('get_student_profile', {});

    expect(result).toEqual({ status: 'success', payload: profile });
    expect(hemis.requests.map(request => request.path)).toEqual(['auth/login', 'account/me']);
    expect(hemis.requests[0].body).toEqual({ login: '123412341234', password: '12345678' });
    expect(hemis.requests[1].authorization).toBe('Bearer abc');
    expect(hemis.requests[1].url).toBe('https://hemis.test/rest/v1/account/me?l=en-US');
  });

  it('uses a token whose login response has a null expiry', async () => {
    const hemis = new FakeHemis()
      .on('auth/login', () => ok({ token: 'abc', expiresAt: null }))
      .on('account/me', () => ok(profile));

    const result = await setup(hemis).invoke('get_student_profile');

    expect(result).toEqual({ status: 'success', payload: profile });
    expect(hemis.loginCount).toBe(1);
    expect(hemis.requests[1].authorization).toBe('Bearer abc');
  });

  it('logs in once for consecutive calls', async () => {
    const hemis = new FakeHemis().on('account/me', () => ok(profile)).on('education/gpa-list', () => ok([]));
    const dispatcher = setup(hemis);

    await dispatcher.invoke('get_student_profile');
    await dispatcher.invoke('get_student_gpa_list');

    expect(hemis.loginCount).toBe(1);
  });

  it('logs in again once after a rejected token and succeeds', async () => {
    let calls = 0;
    const hemis = new FakeHemis().on('account/me', () => {
      calls += 1;
      return calls === 1 ? unauthorized() : ok(profile);
    });

    const result = await setup(hemis).invoke('get_student_profile');

    expect(result).toEqual({ status: 'success', payload: profile });
    expect(hemis.loginCount).toBe(2);
    expect(hemis.requests.map(request => [request.path, request.authorization])).toEqual([
      ['auth/login', undefined],
      ['account/me', 'Bearer test-token-1'],
      ['auth/login', undefined],
      ['account/me', 'Bearer test-token-2'],
    ]);
  });

  it('gives up after two logins when HEMIS keeps rejecting the token', async () => {
    const hemis = new FakeHemis().on('account/me', () => unauthorized());

    const result = await setup(hemis).invoke('get_student_profile');

    expect(result).toEqual({
      status: 'failure',
      errorKind: 'AuthenticationFailed',
      message: "HEMIS rejected the token for 'get_student_profile'",
      upstreamStatus: 401,
    });
    expect(hemis.loginCount).toBe(2);
    expect(hemis.callsTo('account/me')).toBe(2);
  });

  it('gives up after two logins when the credentials are rejected', async () => {
    const hemis = new FakeHemis().on('auth/login', () => unauthorized());

    const result = await setup(hemis).invoke('get_student_profile');

    expect(result).toEqual({
      status: 'failure',
      errorKind: 'AuthenticationFailed',
      message: 'HEMIS rejected the configured login or password',
      upstreamStatus: 401,
    });
    expect(hemis.loginCount).toBe(2);
    expect(hemis.callsTo('account/me')).toBe(0);
  });

  it('shares one login between ten concurrent invocations', async () => {
    const hemis = new FakeHemis().on('education/gpa-list', () => ok([{ gpa: '4.10' }]));
    const dispatcher = setup(hemis);

    const results = await Promise.all(
      Array.from({ length: 10 }, () => dispatcher.invoke('get_student_gpa_list'))
    );

    expect(results.every(result => result.status === 'success')).toBe(true);
    expect(hemis.loginCount).toBe(1);
    expect(hemis.callsTo('education/gpa-list')).toBe(10);
  });

  it('does not retry reference generation after a timeout', async () => {
    const hemis = new FakeHemis().on('student/reference-generate', () => ({ failWith: 'ECONNABORTED' }));

    const result = await setup(hemis).invoke('generate_student_reference');

    expect(result).toEqual({
      status: 'failure',
      errorKind: 'TransportError',
      message: 'Request GET student/reference-generate timed out',
    });
    expect(hemis.callsTo('student/reference-generate')).toBe(1);
  });

  it('does not retry reference generation after a connection reset', async () => {
    const hemis = new FakeHemis().on('student/reference-generate', () => ({ failWith: 'ECONNRESET' }));

    const result = await setup(hemis).invoke('generate_student_reference');

    expect(result.status).toBe('failure');
    expect(hemis.callsTo('student/reference-generate')).toBe(1);
  });

  it('does not re-send reference generation after a rejected token', async () => {
    const hemis = new FakeHemis().on('student/reference-generate', () => unauthorized());

    const result = await setup(hemis).invoke('generate_student_reference');

    expect(result).toMatchObject({ status: 'failure', errorKind: 'AuthenticationFailed' });
    expect(hemis.callsTo('student/reference-generate')).toBe(1);
    expect(hemis.loginCount).toBe(1);
  });

  it('retries idempotent reads after a connection reset', async () => {
    let calls = 0;
    const hemis = new FakeHemis().on('education/semesters', () => {
      calls += 1;
      return calls < 3 ? { failWith: 'ECONNRESET' as const } : ok([{ code: '11' }]);
    });

    const result = await setup(hemis).invoke('get_student_semesters');

    expect(result).toEqual({ status: 'success', payload: [{ code: '11' }] });
    expect(hemis.callsTo('education/semesters')).toBe(3);
  });

  it('does not retry idempotent reads after a timeout', async () => {
    const hemis = new FakeHemis().on('education/semesters', () => ({ failWith: 'ECONNABORTED' }));

    const result = await setup(hemis).invoke('get_student_semesters');

    expect(result).toMatchObject({ status: 'failure', errorKind: 'TransportError' });
    expect(hemis.callsTo('education/semesters')).toBe(1);
  });

  it('reports other error statuses as UpstreamError', async () => {
    const hemis = new FakeHemis().on('education/subject-list', () => ({
      status: 500,
      data: { success: false, error: 'Internal error', data: null, code: 500 },
    }));

    const result = await setup(hemis).invoke('get_student_subjects', { semester: '14' });

    expect(result).toEqual({
      status: 'failure',
      errorKind: 'UpstreamError',
      message: "HEMIS returned status 500 for 'get_student_subjects': Internal error",
      upstreamStatus: 500,
    });
    expect(hemis.loginCount).toBe(1);
  });

  it('reports a success: false envelope as UpstreamError', async () => {
    const hemis = new FakeHemis().on('education/subject-list', () => ({
      status: 200,
      data: { success: false, error: 'Semester not found', data: null, code: 404 },
    }));

    const result = await setup(hemis).invoke('get_student_subjects', { semester: '99' });

    expect(result).toEqual({
      status: 'failure',
      errorKind: 'UpstreamError',
      message: "HEMIS reported a failure for 'get_student_subjects': Semester not found",
      upstreamStatus: 404,
    });
  });

  it('calls public endpoints without logging in', async () => {
    const universities = [{ name: 'Test University', university_type: 'State' }];
    const hemis = new FakeHemis().on('public/universities', () => ok(universities));

    const result = await setup(hemis).invoke('get_universities', { language: 'uz-UZ' });

    expect(result).toEqual({ status: 'success', payload: universities });
    expect(hemis.loginCount).toBe(0);
    expect(hemis.requests[0].authorization).toBeUndefined();
    expect(hemis.requests[0].params).toEqual({ l: 'uz-UZ' });
  });

  it('reports a refused connection as TransportError', async () => {
    const hemis = new FakeHemis().on('public/universities', () => ({ failWith: 'ECONNREFUSED' }));

    const result = await setup(hemis).invoke('get_universities');

    expect(result).toEqual({
      status: 'failure',
      errorKind: 'TransportError',
      message: 'Request GET public/universities failed: fake ECONNREFUSED',
    });
    expect(hemis.callsTo('public/universities')).toBe(1);
  });

  it('attaches page and limit to a task list returned as a bare array', async () => {
    const tasks = [{ name: 'Essay' }, { name: 'Lab report' }];
    const hemis = new FakeHemis().on('education/task-list', () => ok(tasks));

    const result = await setup(hemis).invoke('get_student_task_list', { semester: '14', page: 1 });

    expect(result).toEqual({
      status: 'success',
      payload: { items: tasks, pagination: { page: 1, limit: 10 } },
    });
    expect(hemis.requests[1].params).toEqual({ semester: '14', page: 1, limit: 10, l: 'en-US' });
  });

  it('passes the contract list through with its column labels and pagination', async () => {
    const contracts = {
      items: [{ contractNumber: 'T-1', contractSum: 1000 }],
      attributes: { contractNumber: 'Contract number', contractSum: 'Contract sum' },
      pagination: { totalCount: 1, pageSize: 20, pageCount: 1, page: 1 },
    };
    const hemis = new FakeHemis().on('student/contract-list', () => ok(contracts));

    const result = await setup(hemis).invoke('get_student_contract_list');

    expect(result).toEqual({ status: 'success', payload: contracts });
  });

  it('returns a bare contract array without invented pagination', async () => {
    const contracts = [{ contractNumber: 'T-1' }];
    const hemis = new FakeHemis().on('student/contract-list', () => ok(contracts));

    const result = await setup(hemis).invoke('get_student_contract_list');

    expect(result).toEqual({ status: 'success', payload: contracts });
  });

  it('passes bodies without the HEMIS envelope through', async () => {
    const hemis = new FakeHemis().on('public/university-profile', () => ({
      status: 200,
      data: { name: 'Test University' },
    }));

    const result = await setup(hemis).invoke('get_university_profile');

    expect(result).toEqual({ status: 'success', payload: { name: 'Test University' } });
  });
});
