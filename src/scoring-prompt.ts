// Speaker Match - Scoring prompt
// Deterministic rubric prompt for one (query, speaker) pair. Identical inputs
// always produce the identical prompt string.

import type { Query, SpeakerRecord } from "./types.js";

/** Characters (code points) of biography sent to the model. */
export const BIO_CHAR_LIMIT = 800;

export const SCORING_SYSTEM_PROMPT =
  "You are a strategic business advisor evaluating conference networking opportunities. Always respond with valid JSON.";

const orNA = (value: string) => (value.trim() ? value : "N/A");

/** Cut to `limit` code points, never splitting a surrogate pair. */
export function truncateBio(bio: string, limit: number = BIO_CHAR_LIMIT): string {
  if (bio.length <= limit) return bio;
  const chars = Array.from(bio);
  return chars.length > limit ? chars.slice(0, limit).join("") : bio;
}

export function buildScoringPrompt(query: Query, speaker: SpeakerRecord): string {
  return `You are a strategic business advisor evaluating conference networking opportunities. Be STRICT and SELECTIVE.

USER'S BUSINESS/GOALS:
${query.text}

SPEAKER:
Name: ${orNA(speaker.name)}
Title: ${orNA(speaker.title)}
Organization: ${orNA(speaker.organization)}
Bio: ${orNA(truncateBio(speaker.bio))}

EVALUATION CRITERIA (ALL must be considered):

1. DIRECT RELEVANCE (40% weight)
   - Does their work DIRECTLY relate to the user's specific product/service?
   - Is there clear overlap in technology, mission, or market?
   - Would they immediately understand the value proposition?

2. DECISION-MAKING POWER (30% weight)
   - Can they influence purchasing decisions?
   - Do they control budget or procurement?
   - Are they a key stakeholder in relevant programs?

3. ACTIONABLE OPPORTUNITY (20% weight)
   - Is there a concrete business outcome possible (sale, partnership, introduction)?
   - Can this conversation lead to a specific next step?
   - Is the timing right for engagement?

4. MUTUAL BENEFIT (10% weight)
   - Is there value for both parties?
   - Does the user have something they need?

SCORING RULES (be conservative):
- 9-10: EXCEPTIONAL - Direct decision-maker with immediate need for user's offering. Clear path to business outcome.
- 7-8: STRONG - Highly relevant expertise and influence. Likely to lead to concrete opportunity.
- 5-6: MODERATE - Some relevance but indirect. May be useful for information/networking only.
- 3-4: WEAK - Tangential connection. Low probability of business value.
- 0-2: POOR - No meaningful connection. Not worth the conversation time.

BE STRICT: Only give 9-10 if there's EXCEPTIONAL alignment. Most matches should be 5-7.

Return ONLY a JSON object:
{
  "score": <number 0-10>,
  "reasoning": "<2-3 sentences explaining the score based on criteria above>"
}`;
}
