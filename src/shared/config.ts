import 'dotenv/config';
import path from 'path';

const DEFAULT_PACK = 'policy-packs/vr-va-br-2025-v1';

export const config = {
  port: parseInt(process.env.PORT || '3003', 10),
  nodeEnv: process.env.NODE_ENV || 'development',
  dataDir: path.resolve(process.env.DATA_DIR || '.'),
  policyPackDir: path.resolve(process.env.POLICY_PACK_DIR || DEFAULT_PACK),
  outputDir: path.resolve(process.env.OUTPUT_DIR || '.'),
} as const;
