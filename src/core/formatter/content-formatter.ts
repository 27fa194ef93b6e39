/**
 * Renders a FactSet as the markdown document sent to the presentation service
 */

import type { FactSet } from '../../types/index.js';

export type ContentDocument = string;

const bullets = (items: string[]): string => items.map(item => `- ${item}`).join('\n');

export function formatFactSet(facts: FactSet): ContentDocument {
  const sections = [
    `# ${facts.project_name}\n${facts.tagline}`,
    `## The Problem\n${facts.problem}`,
    `## Our Solution\n${facts.solution}`,
    `## Tech Stack\n${facts.tech_stack.join(', ')}`,
    `## Key Features\n${bullets(facts.key_features)}`,
    `## Innovation\n${facts.innovation}`,
    `## Architecture\n${facts.architecture}`,
    `## What We'll Demo\n${bullets(facts.demo_highlights)}`,
    `## Future Roadmap\n${bullets(facts.future_scope)}`,
  ];
  return sections.join('\n\n').trim();
}
