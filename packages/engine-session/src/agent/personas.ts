export const PERSONA_NAMES = [
  'None',
  'Aggressive',
  'Fair',
  'Liar',
  'Logical',
  'Cooperative',
  'Stubborn',
  'Desperate',
  'Strategic',
] as const;

export type PersonaName = (typeof PERSONA_NAMES)[number];

/** Prompt modifier per persona. "None" leaves behaviour unprompted. */
export const PERSONAS: Record<PersonaName, string> = {
  None: '',
  Aggressive: 'You are an aggressive negotiator.',
  Fair: 'You are a fair negotiator.',
  Liar: 'You are a deceptive negotiator.',
  Logical: 'You are a logical negotiator.',
  Cooperative: 'You are a cooperative negotiator.',
  Stubborn: 'You are a stubborn negotiator.',
  Desperate: 'You are a desperate negotiator.',
  Strategic: 'You are a strategic negotiator.',
};

export function isPersonaName(name: string): name is PersonaName {
  return PERSONA_NAMES.some((p) => p === name);
}
