import { z } from 'zod';

const apiConfigSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
  })
  .transform((env) => ({ port: env.PORT }));

export type ApiConfig = z.output<typeof apiConfigSchema>;

export function loadApiConfig(env: NodeJS.ProcessEnv = process.env): ApiConfig {
  return apiConfigSchema.parse(env);
}
