import { z } from 'zod';

const envScheme = z.object({
  FERRY_SCENARIO: z.string().optional(),
  FERRY_OUTPUT: z.string().optional(),
});

export type CliEnv = z.infer<typeof envScheme>;

const parsedEnv = envScheme.safeParse(process.env);

export const ENV: CliEnv = parsedEnv.success ? parsedEnv.data : {};
