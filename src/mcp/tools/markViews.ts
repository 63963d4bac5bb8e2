/**
 * Mark lookups shared by the per-component marks tools
 */

import { allSubjects, findSubject } from '../../calculators/marks.js';
import type { CourseKind, Mark, SubjectMarks } from '../../types.js';
import { notFound, subjectArgs, success } from './shared.js';
import type { ToolContext, ToolEnvelope } from './shared.js';

export type MarkComponent = 'ca1' | 'ca2' | 'assignment' | 'tutorial';

export interface ComponentMark {
  subjectCode: string;
  subjectName: string;
  kind: CourseKind;
  mark: Mark;
  maxMarks: number | null;
  total: Mark;
  convertedTotal: Mark;
}

export function componentMark(subject: SubjectMarks, component: MarkComponent): ComponentMark {
  return {
    subjectCode: subject.subjectCode,
    subjectName: subject.subjectName,
    kind: subject.kind,
    mark: subject[component],
    maxMarks: subject.maxMarks[component],
    total: subject.total,
    convertedTotal: subject.convertedTotal,
  };
}

/**
 * Marks page as normalized subjects, optionally only one course kind
 */
export async function loadSubjects(context: ToolContext, kind?: CourseKind): Promise<SubjectMarks[]> {
  const subjects = allSubjects(await context.scraper.getMarks());
  return kind ? subjects.filter(subject => subject.kind === kind) : subjects;
}

export function subjectNotFound(
  context: ToolContext,
  query: string,
  subjects: SubjectMarks[],
  kind?: CourseKind
): ToolEnvelope<{ availableSubjects: string[] }> {
  const label = kind ? `${kind} subject` : 'Subject';
  return notFound(context, `${label[0].toUpperCase()}${label.slice(1)} '${query}' not found`, {
    availableSubjects: subjects.map(subject => subject.subjectCode),
  });
}

export async function subjectComponent(
  args: Record<string, unknown>,
  context: ToolContext,
  component: MarkComponent,
  kind?: CourseKind
): Promise<ToolEnvelope> {
  const { subject } = subjectArgs.parse(args);
  const subjects = await loadSubjects(context, kind);
  const found = findSubject(subjects, subject);
  if (!found) {
    return subjectNotFound(context, subject, subjects, kind);
  }
  return success(context, componentMark(found, component));
}

export async function allComponents(
  context: ToolContext,
  component: MarkComponent,
  kind?: CourseKind
): Promise<ToolEnvelope> {
  const marks = (await loadSubjects(context, kind)).map(subject => componentMark(subject, component));
  return success(context, {
    marks,
    totalSubjects: marks.length,
    published: marks.filter(entry => entry.mark !== null).length,
  });
}
