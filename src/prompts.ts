import type { GetPromptResult, Prompt } from '@modelcontextprotocol/sdk/types.js';
import { logger } from './logger.js';
import { NormalizedResult } from './types.js';

export const prompts: Prompt[] = [
  {
    name: 'semester-overview',
    description: 'Summarize subjects, grades, exams, schedule and tasks for a semester',
    arguments: [
      {
        name: 'semester',
        description: 'Semester code (e.g. "14")',
        required: true,
      },
    ],
  },
  {
    name: 'check-my-gpa',
    description: 'Report GPA history and academic standing',
    arguments: [],
  },
];

/**
 * Render a dispatcher result as MCP tool content. Payloads are returned as
 * JSON; presentation is left to the assistant.
 */
export function toToolContent(result: NormalizedResult) {
  if (result.status === 'success') {
    return {
      content: [{ type: 'text' as const, text: JSON.stringify(result.payload ?? null, null, 2) }],
    };
  }
  const status = result.upstreamStatus !== undefined ? ` (status ${result.upstreamStatus})` : '';
  return {
    content: [{ type: 'text' as const, text: `${result.errorKind}${status}: ${result.message}` }],
    isError: true,
  };
}

export function buildPrompt(name: string, args: Record<string, string> = {}): GetPromptResult {
  if (name === 'semester-overview') {
    const semesterCode = args.semester ?? '';
    return {
      messages: [
        {
          role: 'user',
          content: {
            type: 'text',
            text: `Please give me an overview of my semester ${semesterCode}. Follow these steps:

1. Use get_student_subjects with semester "${semesterCode}" to list my subjects and current grades.

2. Use get_student_exams with semester "${semesterCode}" to find upcoming exams.

3. Use get_student_schedule with semester "${semesterCode}" to get this week's classes.

4. Use get_student_task_list with semester "${semesterCode}" to find open tasks and their deadlines.

5. Summarize:
   - Subjects where my grade is below 60%
   - Exams and task deadlines in the next two weeks, soonest first
   - Today's and tomorrow's classes`,
          },
        },
      ],
    };
  }

  if (name === 'check-my-gpa') {
    return {
      messages: [
        {
          role: 'user',
          content: {
            type: 'text',
            text: `Please report my academic standing. Follow these steps:

1. Use get_student_profile to find my current level and semester.

2. Use get_student_gpa_list to get my GPA for every academic year.

3. Present, newest year first:
   - GPA and total credits
   - Number of debt subjects, if any
   - Whether I am eligible to move on to the next course

4. Close with a short note on how my GPA has changed over the years.`,
          },
        },
      ],
    };
  }

  // An empty message list still satisfies the result schema.
  logger.warn(`Unknown prompt requested: ${name}`);
  return { messages: [] };
}
