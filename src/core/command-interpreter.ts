import type { IntelligenceCapability } from '../types/intelligence.js';

/**
 * Keyword table for free-text commands, checked in order. The first entry
 * with a keyword contained in the command wins.
 */
export const COMMAND_KEYWORDS: ReadonlyArray<{
  keywords: readonly string[];
  capability: IntelligenceCapability;
}> = [
  { keywords: ['click', 'fill', 'automate'], capability: 'automation' },
  { keywords: ['analyze', 'understand'], capability: 'webAnalysis' },
  { keywords: ['optimize', 'speed'], capability: 'performance' },
  { keywords: ['secure', 'safe'], capability: 'security' },
  { keywords: ['accessible', 'a11y'], capability: 'accessibility' },
];

export const DEFAULT_COMMAND_CAPABILITY: IntelligenceCapability = 'aiInteraction';

export function interpretCommand(command: string): IntelligenceCapability {
  const text = command.toLowerCase();
  for (const { keywords, capability } of COMMAND_KEYWORDS) {
    if (keywords.some((keyword) => text.includes(keyword))) {
      return capability;
    }
  }
  return DEFAULT_COMMAND_CAPABILITY;
}
