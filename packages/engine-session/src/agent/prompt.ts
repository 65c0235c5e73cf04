import { formatPrice } from '../format.js';
import type { PromptContext } from './types.js';

const RULE = '='.repeat(60);

function section(title: string): string[] {
  return [RULE, title, RULE];
}

function constraintLines(ctx: PromptContext): string[] {
  const { constraints } = ctx;
  const lines =
    constraints.role === 'SELLER'
      ? [
          `Minimum acceptable price: ${formatPrice(constraints.bound)}`,
          `Ideal price: ${formatPrice(constraints.ideal)}`,
        ]
      : [
          `Maximum budget: ${formatPrice(constraints.bound)}`,
          `Ideal price: ${formatPrice(constraints.ideal)}`,
        ];
  if (constraints.urgency) {
    lines.push(`Urgency: ${constraints.urgency}`);
  }
  return lines;
}

function offerHintLines(ctx: PromptContext): string[] {
  if (ctx.previous_offers.length === 0) {
    return [];
  }
  const direction =
    ctx.role === 'SELLER'
      ? 'do not ask for more than your last offer'
      : 'do not offer less than your last offer';
  return [
    `Your previous offers: ${ctx.previous_offers.map(formatPrice).join(', ')}`,
    `Stay consistent: ${direction}.`,
    '',
  ];
}

function transcriptLines(ctx: PromptContext): string[] {
  return ctx.transcript.map((turn) => {
    const who = turn.agent_id === ctx.agent_id ? 'You' : 'Other party';
    const text = turn.error ? '[no message]' : turn.message;
    return `[Round ${turn.round}] ${who}: ${text}`;
  });
}

/** Render a PromptContext to the text sent to a generation capability. */
export function renderPrompt(ctx: PromptContext): string {
  const lines: string[] = [
    ...section(`YOUR ROLE: ${ctx.role}`),
    `Your goal: ${ctx.goal}`,
    '',
  ];

  if (ctx.persona_modifier) {
    lines.push(ctx.persona_modifier, '');
  }

  if (ctx.scenario) {
    lines.push(...section('NEGOTIATION CONTEXT:'), ctx.scenario, '');
  }

  lines.push(
    ...section('YOUR CONSTRAINTS:'),
    ...constraintLines(ctx),
    'Note: Use this information strategically. You may choose whether to reveal it.',
    '',
    ...offerHintLines(ctx),
  );

  const opening = ctx.transcript.length === 0;
  if (!opening) {
    lines.push(...section(`CONVERSATION HISTORY (Round ${ctx.round}):`), ...transcriptLines(ctx), '');
  }

  lines.push(
    ...section('YOUR TASK:'),
    opening
      ? 'Begin the negotiation. Make your opening statement.'
      : "Respond to the other party's latest message and keep negotiating toward the best outcome for you.",
    '',
    "Your response (do not include labels like 'Agent A:' or 'Seller:'):",
  );

  return lines.join('\n');
}
