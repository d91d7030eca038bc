/**
 * Text renderings of equation systems, parse outcomes and solutions
 */

import type { SolveEquationsResult } from "./solve.ts";
import { describeStatus, isParseSuccess, type ParseOutcome } from "./status.ts";
import { type EquationSystem, getConstant, variableNames } from "./system.ts";

export function formatNumber(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return String(+value.toFixed(10));
}

/** One equation as "2x - y = 3", skipping zero coefficients */
export function formatEquation(system: EquationSystem, equation: number): string {
  const names = variableNames(system);
  const row = system.coefficients.get(equation);
  const terms: string[] = [];

  for (const [index, name] of names.entries()) {
    const coefficient = row?.get(index) ?? 0;
    if (coefficient === 0) continue;

    const magnitude = Math.abs(coefficient);
    const body = magnitude === 1 ? name : `${formatNumber(magnitude)}${name}`;
    if (terms.length === 0) {
      terms.push(coefficient < 0 ? `-${body}` : body);
    } else {
      terms.push(coefficient < 0 ? `- ${body}` : `+ ${body}`);
    }
  }

  const lhs = terms.length > 0 ? terms.join(" ") : "0";
  return `${lhs} = ${formatNumber(getConstant(system, equation))}`;
}

/** Markdown summary of a system: variables, then one equation per line */
export function formatSystem(system: EquationSystem): string {
  const names = variableNames(system);
  const lines = [
    `**Equations**: ${system.equationCount}`,
    `**Variables**: ${names.length > 0 ? names.join(", ") : "(none)"}`,
  ];

  if (system.equationCount > 0) {
    lines.push("");
    for (let eq = 0; eq < system.equationCount; eq++) {
      lines.push(`${eq + 1}. ${formatEquation(system, eq)}`);
    }
  }

  return lines.join("\n");
}

/**
 * Status line for one parsed line; errors get a caret under the offset
 */
export function formatOutcome(outcome: ParseOutcome, line: string): string {
  if (isParseSuccess(outcome.status)) return describeStatus(outcome.status);

  return [
    `${describeStatus(outcome.status)} at column ${outcome.position + 1}`,
    line,
    `${" ".repeat(outcome.position)}^`,
  ].join("\n");
}

export function formatSolveResult(result: SolveEquationsResult): string {
  switch (result.kind) {
    case "parse-error":
      return `Line ${result.line + 1}, column ${result.position + 1}: ${result.message}`;
    case "no-equations":
      return "No equations to solve.";
    case "too-few-equations":
      return `Too few equations: ${result.equations} equation(s) for ${result.variables} variable(s).`;
    case "too-many-equations":
      return `Too many equations: ${result.equations} equation(s) for ${result.variables} variable(s).`;
    case "singular":
      return "The system of equations is singular.";
    case "ill-conditioned":
      return `The system of equations is ill-conditioned (condition estimate ${result.conditionEstimate.toExponential(2)}).`;
    case "solved":
      return result.solution.map((v) => `${v.name} = ${formatNumber(v.value)}`).join("\n");
  }
}
