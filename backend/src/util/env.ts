import { config } from 'dotenv';
import { z } from 'zod';

config();

const envSchema = z.object({
  DISCORD_WEBHOOK_URL: z.string().default(''),
  AGENT_CONFIG_PATH: z.string().default('config/agent.json'),
  DATA_DIR: z.string().default('data'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('0.0.0.0'),
  COINGECKO_API_BASE_URL: z
    .string()
    .url()
    .default('https://api.coingecko.com/api/v3'),
  FEAR_GREED_API_URL: z
    .string()
    .url()
    .default('https://api.alternative.me/fng/'),
});

export const env = envSchema.parse(process.env);
