import * as fs from 'node:fs/promises';
import * as path from 'node:path';

export type PromptName = 'decompose' | 'quality-review' | 'synthesize';

const DECOMPOSE_PROMPT = `\
You are a software task planner practicing strict test-driven development.
Break the user's task into small, atomic subtasks grouped for parallel execution.

Phases:
- RED: write a failing test for one behaviour
- GREEN: write the minimum code that makes the RED tests pass
- REFACTOR: improve structure without changing behaviour
- ANALYZE: review or analyse existing work

Rules:
- Tasks in the same group must be independent of each other and can run at the same time
- Groups run in ascending order; a group may depend on every earlier group
- Never put more tasks in a group than there are worker slots
- Every task id is unique across the whole plan
- "files" lists the paths a task reads or writes

Respond with a single JSON object and nothing else:
{
  "parallel_groups": [
    {
      "group": 1,
      "description": "what this group achieves",
      "tasks": [
        { "id": "red-1", "phase": "RED", "task": "what to do", "files": ["tests/test_example.py"] }
      ]
    }
  ]
}`;

const QUALITY_REVIEW_PROMPT = `\
You are a senior reviewer checking the output of several coding agents.
For every task judge whether the result does what the task asked, whether
tests and code agree, and whether anything is obviously missing or broken.

Respond with a single JSON object and nothing else:
{
  "status": "pass" | "fail" | "needs_review",
  "overall_score": 0-100,
  "tasks": { "<task_id>": { "score": 0-100, "issues": ["..."] } },
  "summary": "one paragraph",
  "recommendations": ["..."]
}`;

const SYNTHESIZE_PROMPT = `\
You combine execution results and a quality review into a final report for
the person who requested the work. Be concrete about what was produced,
what failed, and what to do next.

Respond with a single JSON object and nothing else:
{
  "summary": "what was accomplished",
  "deliverables": ["file or artifact produced"],
  "issues": ["problems that remain"],
  "next_steps": ["recommended follow-up"],
  "confidence": 0-100
}`;

export const DEFAULT_PROMPTS: Readonly<Record<PromptName, string>> = {
  decompose: DECOMPOSE_PROMPT,
  'quality-review': QUALITY_REVIEW_PROMPT,
  synthesize: SYNTHESIZE_PROMPT,
};

/**
 * Load a system prompt. `<promptsDir>/<name>.md` replaces the built-in
 * template when it exists and is non-empty.
 */
export async function loadPrompt(name: PromptName, promptsDir: string): Promise<string> {
  try {
    const override = await fs.readFile(path.join(promptsDir, `${name}.md`), 'utf-8');
    if (override.trim() !== '') return override.trim();
  } catch (err) {
    if (!(err instanceof Error && 'code' in err && err.code === 'ENOENT')) throw err;
  }
  return DEFAULT_PROMPTS[name];
}
