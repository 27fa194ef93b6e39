/**
 * Prompts for fact extraction and slide rendering
 */

// ============================================================================
// SYSTEM PROMPTS
// ============================================================================

export const SYSTEM_PROMPT = `You are an expert at pitching hackathon projects.
You read codebases and write short, concrete presentation content aimed at what judges look for.`;

/**
 * Build the user prompt for one analysis attempt. The digest is embedded verbatim.
 */
export function buildAnalysisPrompt(digest: string): string {
  return `Read the codebase below and write the content for a hackathon presentation about it.

CODEBASE DIGEST:
${digest}

Respond with one JSON object containing exactly these keys:
- project_name: the project's name, inferred if it is not stated
- tagline: a single sentence of at most 10 words
- problem: the problem the project addresses, in 2-3 sentences
- solution: how the project addresses it, in 2-3 sentences
- tech_stack: array of the main languages, frameworks and libraries
- key_features: array of 3-5 main features
- innovation: what is new or unusual about it, in 2-3 sentences
- architecture: a short overview of the system design, in 2-3 sentences
- demo_highlights: array of 2-3 things worth showing in a live demo
- future_scope: array of 2-3 next steps

Be specific to this codebase. Prefer active voice and plain words.
Call out technical achievements, but do not overstate them.

Respond ONLY with valid JSON. No markdown and no code fences.

Shape of the expected output:
{
  "project_name": "ProjectName",
  "tagline": "Short catchy description",
  "problem": "Problem statement",
  "solution": "How the project solves it",
  "tech_stack": ["TypeScript", "React", "PostgreSQL"],
  "key_features": ["Feature 1", "Feature 2", "Feature 3"],
  "innovation": "What sets it apart",
  "architecture": "System design overview",
  "demo_highlights": ["Demo point 1", "Demo point 2"],
  "future_scope": ["Next step 1", "Next step 2"]
}`;
}

/**
 * Styling guidance sent with every render request
 */
export const RENDER_INSTRUCTIONS = `Build a modern, visually striking hackathon deck.
- Favour bold colours and uncluttered layouts
- Add icons where they help
- Keep the text short
- Make the visual hierarchy obvious
- It should be ready to present live`;
