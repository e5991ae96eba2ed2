import { z } from 'zod';
import { AgentSettings } from './entities/AgentConfig.js';
import { ValidationError } from './errors.js';

const identifier = (field: string) =>
  z.string({ required_error: `${field} is required` }).trim().min(1, `${field} must not be empty`);

export const AgentSettingsSchema = z.object({
  prompt_preamble: z.string({ required_error: 'prompt_preamble is required' }),
  model_name: z.string().min(1).default('gpt-4o-mini'),
  max_tokens: z.number().int().positive().default(400),
  temperature: z.number().min(0).max(2).default(0.3),
  user_initial_message: z.string().optional(),
  bot_initial_message: z.string().optional(),
}) satisfies z.ZodType<AgentSettings, z.ZodTypeDef, unknown>;

export const AddConfigRequestSchema = z.object({
  client_id: identifier('client_id'),
  config_id: identifier('config_id'),
  bot_name: z.string().min(1).default('Untitled Bot'),
  config: AgentSettingsSchema,
});

export const ConfigLookupSchema = z.object({
  client_id: identifier('client_id'),
  config_id: identifier('config_id'),
});

/**
 * Parse a request payload, turning zod issues into a ValidationError
 */
export function parseRequest<T extends z.ZodTypeAny>(schema: T, payload: unknown): z.infer<T> {
  const result = schema.safeParse(payload);
  if (!result.success) {
    const details = result.error.errors
      .map((err) => `${err.path.join('.') || 'body'}: ${err.message}`)
      .join('; ');
    throw new ValidationError(details);
  }
  return result.data;
}
