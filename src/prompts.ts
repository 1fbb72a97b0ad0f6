/**
 * Subject Tutor: Prompt Templates
 *
 * Copyright (c) 2024 vario.automation
 * Proprietary and confidential. All rights reserved.
 */

export const NO_CALCULATION = "no calculation needed";

export const UNKNOWN_SUBJECT_ANSWER =
  "I'm sorry, but I can only help with questions related to math, physics, or chemistry.\n\n" +
  "Your question doesn't seem to fit into these categories. Could you please rephrase it " +
  "to focus on one of these subjects?";

export function classificationPrompt(question: string): string {
  return `You are a subject classifier for an AI tutoring system. Decide which subject the question belongs to: math, physics, or chemistry.

Question: ${question}

Guidelines:
- Math questions involve calculations, equations, algebra, geometry, calculus, etc.
- Physics questions involve forces, energy, motion, waves, electricity, etc.
- Chemistry questions involve elements, reactions, compounds, molecules, etc.

Respond with ONLY one word: math, physics, or chemistry. If the question does not clearly fit any of these subjects, respond with 'unknown'.`;
}

export function expressionExtractionPrompt(question: string): string {
  return `Given this math question: ${question}

Extract the calculation that needs to be performed. For example:
- "What is 5 + 3?" -> "5 + 3"
- "Calculate the area of a rectangle with length 5.2m and width 3.8m" -> "5.2 * 3.8"
- "What is 20% of 150?" -> "150 * 0.2"

Respond with ONLY the expression to calculate, or '${NO_CALCULATION}' if none is needed.`;
}

export function mathExplanationPrompt(question: string, toolSummary?: string): string {
  return `Please solve this math problem: ${question}
${toolSummary ? `\n${toolSummary}\n` : ""}
Provide a complete mathematical solution that includes:
1. Mathematical Concepts Involved
2. Step-by-Step Solution
3. Verification and Reasoning
4. Final Answer

Explain the concepts and reasoning clearly.${toolSummary ? " Use the verified results above; do not recompute them differently." : ""}`;
}

export function physicsAnalysisPrompt(question: string): string {
  return `Analyze this physics question: ${question}

Respond with a JSON object in exactly this format:
{
  "needs_constant": true or false,
  "constant_name": "name or symbol of the constant (only when needs_constant is true)",
  "explanation_needed": "physics concepts to explain (only when needs_constant is false)"
}

Examples:
"What is Planck's constant?" -> {"needs_constant": true, "constant_name": "Planck's constant"}
"How does gravity work?" -> {"needs_constant": false, "explanation_needed": "gravitational force and its effects"}

Respond with valid JSON only: no markdown and no text before or after it.`;
}

export function physicsConstantPrompt(question: string, constantLine: string): string {
  return `Please explain this physics concept: ${question}

Reference value: ${constantLine}

Provide a clear explanation that:
1. Explains what the constant represents
2. Describes its significance in physics
3. Uses the reference value in context
4. Relates it to the question

Keep the explanation clear and concise.`;
}

export function physicsExplanationPrompt(question: string, focus: string, toolSummary?: string): string {
  return `Please solve this physics problem: ${question}
${toolSummary ? `\n${toolSummary}\n` : ""}
Focus on explaining: ${focus}

Include the relevant formula, substitute values with units, and state the final answer clearly. Keep the explanation clear and concise.`;
}

export function chemistryPrompt(question: string, toolSummary?: string): string {
  return `Please answer this chemistry question: ${question}
${toolSummary ? `\n${toolSummary}\n` : ""}
Provide a clear, concise answer that:
1. Directly addresses the question
2. Includes relevant chemical concepts
3. Uses simple, understandable language
4. Gives practical examples where appropriate

Keep the response focused and to the point.`;
}

/**
 * Prefix a prompt with recent conversation turns
 */
export function withContext(prompt: string, context?: string): string {
  return context ? `Context: ${context}\nQuery: ${prompt}` : prompt;
}
