/**
 * Rule-based question classifier. No LLM required.
 *
 * Rules are checked in order and the first match wins; each rule is a
 * case-insensitive substring test. Examples:
 * - "top idh que más subieron"       → top_movers
 * - "costo unitario ultimo"          → unit_cost
 * - "variación l14"                  → l14_variation
 * - "volumen del mes"                → volume
 * - "peor marca"                     → worst_brands
 */

export type QueryIntent =
  | 'top_movers'
  | 'unit_cost'
  | 'l14_variation'
  | 'volume'
  | 'worst_brands'
  | 'help';

interface IntentRule {
  intent: Exclude<QueryIntent, 'help'>;
  matches: (q: string) => boolean;
}

const has = (q: string, ...words: string[]) => words.some(w => q.includes(w));

export const INTENT_RULES: readonly IntentRule[] = [
  { intent: 'top_movers', matches: q => has(q, 'top') && has(q, 'idh', 'material') },
  { intent: 'unit_cost', matches: q => has(q, 'costo') && has(q, 'unitario') },
  { intent: 'l14_variation', matches: q => has(q, 'variacion', 'variación') && has(q, 'l14') },
  { intent: 'volume', matches: q => has(q, 'volumen', 'vol') },
  { intent: 'worst_brands', matches: q => has(q, 'marca') && has(q, 'peor') },
];

export function classifyQuery(input: string): QueryIntent {
  const q = input.toLowerCase();
  for (const rule of INTENT_RULES) {
    if (rule.matches(q)) return rule.intent;
  }
  return 'help';
}
