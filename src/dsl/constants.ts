/** DSL version emitted by the construction API and compared against on import. */
export const CURRENT_DSL_VERSION = '0.4.0';

/** Version assumed when a document omits `version`. */
export const DEFAULT_IMPORTED_VERSION = '0.1.0';

/** Largest document accepted, counted in Unicode code points. */
export const DSL_MAX_SIZE = 10 * 1024 * 1024;

export const APP_MODES = ['completion', 'chat', 'agent-chat', 'advanced-chat', 'workflow'] as const;
export type AppMode = (typeof APP_MODES)[number];

/** Modes whose document carries a `workflow` graph. */
export const GRAPH_APP_MODES: ReadonlySet<AppMode> = new Set<AppMode>(['workflow', 'advanced-chat']);

export const ENVIRONMENT_VARIABLE_TYPES = ['string', 'number', 'secret'] as const;
export type EnvironmentVariableType = (typeof ENVIRONMENT_VARIABLE_TYPES)[number];

export const CONVERSATION_VARIABLE_TYPES = [
  'string',
  'number',
  'array[string]',
  'array[number]',
  'array[object]',
  'object',
] as const;
export type ConversationVariableType = (typeof CONVERSATION_VARIABLE_TYPES)[number];

export function isAppMode(value: unknown): value is AppMode {
  return typeof value === 'string' && APP_MODES.some((mode) => mode === value);
}
