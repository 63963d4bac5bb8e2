import { describe, expect, it } from 'vitest';
import { functionDeclarations, handleToolCall, toolNames } from '../src/mcp/tools/index.js';
import { FakePortal, createContext } from './helpers/fakePortal.js';

const MONDAY_9AM = new Date(2025, 8, 15, 9, 0);

function call(name: string, args?: Record<string, unknown>, options: { now?: Date; password?: string } = {}) {
  const portal = new FakePortal();
  const context = createContext(portal, options.now ?? MONDAY_9AM, { password: options.password });
  return { portal, result: handleToolCall(name, args, context) };
}

describe('tool registry', () => {
  it('registers every tool once', () => {
    expect(toolNames).toHaveLength(30);
    expect(new Set(toolNames).size).toBe(30);
  });

  it('answers unknown tools with a validation error', async () => {
    const envelope = await call('get_gpa').result;
    expect(envelope.status).toBe('error');
    expect(envelope.error?.kind).toBe('validation');
    expect(envelope.error?.message).toMatch(/^Unknown tool: get_gpa\. Available: get_ca1_subject_mark, /);
  });

  it('reports missing arguments as validation errors', async () => {
    const envelope = await call('get_ca1_subject_mark', {}).result;
    expect(envelope).toMatchObject({
      status: 'error',
      error: { kind: 'validation', message: 'subject: Required' },
    });
  });

  it('stamps envelopes with the context clock', async () => {
    const envelope = await call('get_break_schedule').result;
    expect(envelope.timestamp).toBe(MONDAY_9AM.toISOString());
  });
});

describe('marks tools', () => {
  it('looks up a lab CA1 mark by code', async () => {
    const envelope = await call('get_ca1_subject_mark', { subject: '20xt88' }).result;
    expect(envelope.status).toBe('success');
    expect(envelope.data).toMatchObject({ subjectCode: '20XT88', kind: 'lab', mark: 18.5, maxMarks: 25 });
  });

  it('returns null for an absent theory mark', async () => {
    const envelope = await call('get_ca2_subject_mark', { subject: 'Computer Networks' }).result;
    expect(envelope.data).toMatchObject({ subjectCode: '20XT82', mark: null, maxMarks: 30 });
  });

  it('lists the subjects it knows when the subject is missing', async () => {
    const envelope = await call('get_ca1_subject_mark', { subject: 'Compilers' }).result;
    expect(envelope).toMatchObject({
      status: 'not_found',
      message: "Subject 'Compilers' not found",
      data: { availableSubjects: ['20XT88', '20XT81', '20XT82'] },
    });
  });

  it('limits assignment lookups to theory subjects', async () => {
    const envelope = await call('get_assignment_mark_by_subject', { subject: '20XT88' }).result;
    expect(envelope).toMatchObject({
      status: 'not_found',
      message: "Theory subject '20XT88' not found",
      data: { availableSubjects: ['20XT81', '20XT82'] },
    });
  });

  it('reports a changed marks page as a structure error', async () => {
    const portal = new FakePortal();
    portal.overrides.set(
      '/studzone/ContinuousAssessment/CAMarksView',
      () => new Response('<html><body><h1>Scheduled maintenance</h1></body></html>')
    );
    const envelope = await handleToolCall('get_ca1_all_marks', {}, createContext(portal, MONDAY_9AM));
    expect(envelope).toMatchObject({
      status: 'error',
      error: { kind: 'page_structure', message: 'marks: no lab (LT1) or theory (T1) marks table found' },
    });
  });
});

describe('attendance tools', () => {
  it('computes bunks for one course at a custom minimum', async () => {
    const envelope = await call('get_subject_available_bunks', { course_code: '20XT82', min_attendance: 70 }).result;
    expect(envelope.data).toMatchObject({ courseCode: '20XT82', availableBunks: 1, status: 'safe' });
  });

  it('advertises the minimum attendance range the arguments accept', () => {
    const definition = functionDeclarations.find(tool => tool.name === 'get_subject_available_bunks');
    expect(definition?.inputSchema.properties.min_attendance).toMatchObject({ exclusiveMinimum: 0, maximum: 100 });
    expect(definition?.inputSchema.properties.min_attendance).not.toHaveProperty('minimum');
  });

  it('rejects a minimum of 0', async () => {
    const envelope = await call('get_subject_available_bunks', { course_code: '20XT82', min_attendance: 0 }).result;
    expect(envelope.error).toEqual({ kind: 'validation', message: 'min_attendance: min_attendance must be above 0' });
  });

  it('rejects a minimum above 100', async () => {
    const envelope = await call('get_subject_available_bunks', { course_code: '20XT82', min_attendance: 150 }).result;
    expect(envelope.error).toEqual({
      kind: 'validation',
      message: 'min_attendance: min_attendance cannot exceed 100',
    });
  });

  it('summarizes bunks across courses', async () => {
    const envelope = await call('get_all_available_bunks', {}).result;
    expect(envelope.data).toMatchObject({
      summary: {
        totalSubjects: 3,
        totalAvailableBunks: 5,
        subjectsBelowMinimum: 1,
        subjectsSafeToBunk: 1,
        minAttendance: 75,
        averageBunksPerSubject: 1.67,
      },
    });
  });

  it('names the known courses for an unknown code', async () => {
    const envelope = await call('get_subject_attendance', { course_code: '20XT99' }).result;
    expect(envelope).toMatchObject({
      status: 'not_found',
      message: "Course '20XT99' not found",
      data: { availableCourses: ['20XT81', '20XT82', '20XT88'] },
    });
  });
});

describe('timetable tools', () => {
  it('returns one day of classes', async () => {
    const envelope = await call('get_schedule_for_day', { day: 'mon' }).result;
    expect(envelope.data).toMatchObject({
      day: 'Monday',
      totalClasses: 3,
      firstClassStarts: '08:30',
      lastClassEnds: '15:20',
    });
  });

  it('rejects an unknown day', async () => {
    const envelope = await call('get_schedule_for_day', { day: 'funday' }).result;
    expect(envelope.status).toBe('not_found');
    expect(envelope.message).toBe("Unknown day 'funday'");
    expect(envelope.data).toEqual({
      availableDays: ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'],
    });
  });

  it('finds the next class later today', async () => {
    const envelope = await call('get_next_class').result;
    expect(envelope.data).toMatchObject({
      currentDay: 'Monday',
      currentTime: '09:00',
      nextClass: { courseCode: '20XT82', startTime: '09:20', minutesUntil: 20, isToday: true },
    });
  });

  it('marks the running class as ongoing', async () => {
    const envelope = await call('get_schedule_from_now').result;
    const data = envelope.data;
    expect(data).toMatchObject({ day: 'Monday', remainingClasses: 3 });
    expect(data).toHaveProperty('classes.0.status', 'ongoing');
    expect(data).toHaveProperty('classes.1.minutesUntilStart', 20);
  });

  it('reports the break in progress and the next one', async () => {
    const envelope = await call('get_break_schedule', {}, { now: new Date(2025, 8, 15, 12, 30) }).result;
    expect(envelope.data).toMatchObject({
      currentTime: '12:30',
      currentBreak: { name: 'Lunch Break', minutesRemaining: 70 },
      nextBreak: { name: 'Afternoon Break', minutesUntil: 170 },
    });
  });

  it('does not touch the portal for break times', async () => {
    const { portal, result } = call('get_break_schedule');
    await result;
    expect(portal.requests).toEqual([]);
  });
});

describe('course tools', () => {
  it('matches whole words in course titles', async () => {
    const envelope = await call('get_course_code_by_name', { course_name_query: 'systems' }).result;
    expect(envelope.data).toEqual({
      query: 'systems',
      matchType: 'word',
      matches: [
        { courseCode: '20XT81', courseName: 'Operating Systems' },
        { courseCode: '20XT88', courseName: 'Operating Systems Laboratory' },
      ],
      totalMatches: 2,
    });
  });

  it('lists departments when one has no courses', async () => {
    const envelope = await call('get_courses_by_department', { department_code: 'zz' }).result;
    expect(envelope).toMatchObject({
      status: 'not_found',
      data: { availableDepartments: ['XC', 'XT'] },
    });
  });

  it('recognizes laboratory courses by title', async () => {
    const envelope = await call('list_lab_courses').result;
    expect(envelope.data).toMatchObject({ totalLabCourses: 1, labCourses: [{ code: '20XT88' }] });
  });
});

describe('health_check', () => {
  it('is healthy when login and scraping work', async () => {
    const envelope = await call('health_check').result;
    expect(envelope.status).toBe('success');
    expect(envelope.data).toMatchObject({ status: 'healthy', server: 'campus-portal-mcp', subjects: 3 });
  });

  it('is unhealthy with bad credentials', async () => {
    const envelope = await call('health_check', {}, { password: 'wrong-secret' }).result;
    expect(envelope).toMatchObject({
      status: 'error',
      data: { status: 'unhealthy' },
      error: { kind: 'authentication', message: 'Login failed. Check your roll number and password.' },
    });
  });
});
