import 'dotenv/config';

export const config = {
  port: parseInt(process.env.PORT || '3002', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  clientUrl: process.env.CLIENT_URL || 'http://localhost:5174',
  maxRounds: parseInt(process.env.MAX_ROUNDS || '100000', 10),
  maxHistoryRounds: parseInt(process.env.MAX_HISTORY_ROUNDS || '1000', 10),
} as const;
