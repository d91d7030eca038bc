/**
 * Prompt templates that teach a client the equation grammar
 * and how to drive the parse_line / solve_equations tools
 */

export interface EquationTemplate {
  name: string;
  description: string;
  system_prompt: string;
}

const GRAMMAR = `Write one linear equation per line.
- Terms: a number (3, 2.5, .5, 12.), a variable (x, rate_B), or a number then a variable (2x, 4 y).
- Scale a number by a power of ten with "^": 1.5^2 is 150, 1.5^-2 is 0.015 (one or two exponent digits).
- Join terms with "+" and "-"; each equation has exactly one "=".
- Variable names are letters and underscores, case sensitive.
- An equation may continue on the next line if the line ends with an operator.
- Numbers have at most 20 digits.`;

const templates: Record<string, EquationTemplate> = {
  "solve-linear-system": {
    name: "Solve Linear System",
    description: "Write a word problem as linear equations and solve it",
    system_prompt: `You are turning a problem into a system of linear equations.
${GRAMMAR}

Use as many equations as there are unknowns, then call solve_equations with the text.
If a line is rejected, read the status and column, fix that line and try again.`,
  },

  "build-document": {
    name: "Build Equation Document",
    description: "Enter equations line by line into a named document",
    system_prompt: `You are entering a system of linear equations one line at a time.
${GRAMMAR}

Call parse_line once per line with the same session_id.
Check get_system to review the coefficients, then call solve_equations with that session_id.
After a parse error, call reset_session and start again.`,
  },
};

function requireTemplate(key: string): EquationTemplate {
  const template = templates[key];
  if (!template) throw new Error(`Unknown prompt template: ${key}`);
  return template;
}

export const solveLinearSystemPrompt = {
  name: "solve-linear-system",
  description: "Guide for writing and solving a system of linear equations",
  arguments: [
    {
      name: "problem",
      description: "The problem to express as equations",
      required: true,
    },
  ],
  load: async (args: { problem?: string }) => {
    const template = requireTemplate("solve-linear-system");
    return `${template.system_prompt}\n\nProblem: ${args.problem || "Not specified"}`;
  },
};

export const buildDocumentPrompt = {
  name: "build-document",
  description: "Guide for entering equations line by line with parse_line",
  arguments: [
    {
      name: "session_id",
      description: "Document ID to use (optional)",
      required: false,
    },
  ],
  load: async (args: { session_id?: string }) => {
    const template = requireTemplate("build-document");
    const sessionId = args.session_id || `doc_${Date.now().toString(36)}`;
    return `${template.system_prompt}\n\nUse session_id "${sessionId}".`;
  },
};
