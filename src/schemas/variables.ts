import { z } from 'zod';
import { CONVERSATION_VARIABLE_TYPES, ENVIRONMENT_VARIABLE_TYPES } from '../dsl/constants.js';

/**
 * Environment variable accepted by the construction API. Unlike the document
 * validator, `value` is mandatory here.
 */
export const environmentVariableSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  value_type: z.enum(ENVIRONMENT_VARIABLE_TYPES),
  value: z.string(),
  required: z.boolean().default(true),
});

export const conversationVariableSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  value_type: z.enum(CONVERSATION_VARIABLE_TYPES),
  description: z.string().default(''),
});

export type EnvironmentVariableInput = z.input<typeof environmentVariableSchema>;
export type ConversationVariableInput = z.input<typeof conversationVariableSchema>;
