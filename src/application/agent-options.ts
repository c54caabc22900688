import { z } from 'zod';

const REQUIRED_MESSAGE = 'token, user, and expected_receive_period_in_days are all required.';

const template = (defaultValue: string) => z.string().default(defaultValue);

/**
 * Agent options. Every field except `expected_receive_period_in_days`
 * is a Handlebars template rendered per event.
 */
export const agentOptionsSchema = z.object({
  token: z.string().trim().min(1, REQUIRED_MESSAGE),
  user: z.string().trim().min(1, REQUIRED_MESSAGE),
  expected_receive_period_in_days: z.coerce
    .number({ invalid_type_error: REQUIRED_MESSAGE })
    .int()
    .positive()
    .default(1),
  message: template('{{ message }}'),
  device: template('{{ device }}'),
  title: template('{{ title }}'),
  url: template('{{ url }}'),
  url_title: template('{{ url_title }}'),
  image_url: template('{{ image_url }}'),
  priority: template('{{ priority }}'),
  timestamp: template('{{ timestamp }}'),
  sound: template('{{ sound }}'),
  retry: template('{{ retry }}'),
  expire: template('{{ expire }}'),
  html: template('false'),
});

export type AgentOptions = z.infer<typeof agentOptionsSchema>;
export type AgentOptionsInput = z.input<typeof agentOptionsSchema>;

/**
 * Validates raw options, throwing an Error that lists every issue.
 */
export function parseAgentOptions(raw: unknown): AgentOptions {
  const parsed = agentOptionsSchema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid Pushover agent options (${details})`);
  }
  return parsed.data;
}
