import { ToolDefinition } from '../common/tool.types';

const CATEGORY_HEADINGS: Record<ToolDefinition['category'], string> = {
  lookup: 'Directory lookups (users, items):',
  network: 'HTTP requests (GET, POST):'
};

function toolSection(tools: ToolDefinition[]): string {
  const lines: string[] = ['AVAILABLE TOOLS:'];
  for (const category of ['lookup', 'network'] as const) {
    const group = tools.filter((t) => t.category === category);
    if (group.length === 0) continue;
    lines.push(CATEGORY_HEADINGS[category]);
    for (const t of group) {
      lines.push(`- ${t.name}: ${t.description}`);
    }
  }
  return lines.join('\n');
}

/** System prompt for the planner. The planner is never given callable tools. */
export function buildPlannerPrompt(tools: ToolDefinition[] = []): string {
  const sections: string[] = [
    "You are an AI planning assistant. Analyze the user's request in the context of the conversation so far and create a concise execution plan.",
    'Your plan should:\n' +
      '1. Identify the key tasks needed to fulfill the request\n' +
      '2. Determine which tools (if any) are needed\n' +
      '3. Outline the steps in a clear, logical order',
    'Keep the plan brief and actionable. Resolve pronouns and references ("they", "that item") against earlier turns. ' +
      'If the request is simple (like a greeting), say that no tools are needed.',
    `Today's date is ${new Date().toISOString().split('T')[0]}.`
  ];

  if (tools.length > 0) {
    sections.push(
      toolSection(tools) +
        '\n\nDescribe which tools to use; do not attempt to call them.'
    );
  }

  return sections.join('\n\n');
}

/** System prompt for the executor, carrying the planner's plan. */
export function buildExecutorPrompt(
  plan: string,
  tools: ToolDefinition[] = []
): string {
  const sections: string[] = [
    'You are a helpful AI assistant with access to tools for directory lookups and HTTP requests.',
    `Current execution plan:\n${plan.trim() || 'No specific plan - respond naturally.'}`,
    'Follow the plan to help the user. Be concise and helpful. Use tools when the plan calls for data you do not have; ' +
      'if the request is simple, respond directly.'
  ];

  if (tools.length > 0) {
    sections.push(toolSection(tools));
  }

  sections.push(
    'RULES:\n' +
      '- A tool result with an "error" field means the call failed. Do not retry the same call with the same input; ' +
      'either try a different approach or answer with what you have and say what could not be retrieved.\n' +
      '- Never invent user or item details that no tool returned.'
  );

  return sections.join('\n\n');
}

export const TOOLS_WITHDRAWN_NOTICE =
  'Tool calls have failed repeatedly and tools are no longer available for this turn. ' +
  'Answer the user now with the information you already have, and say briefly what could not be retrieved.';

export const STEP_BUDGET_NOTICE =
  'I ran out of steps before finishing this request. Please try narrowing it down.';
