/**
 * Node configuration from environment variables.
 *
 * index.ts loads .env through dotenv before calling loadConfig().
 */

import { z } from 'zod';
import { Address, isZeroAddress } from './ledger/address';
import { addressSchema } from './ledger/schemas';

const nonZeroAddress = addressSchema.refine(address => !isZeroAddress(address), {
  message: 'The null address is not allowed',
});

const envSchema = z.object({
  OWNER_ADDRESS: nonZeroAddress,
  MASTER_ADMIN_ADDRESS: nonZeroAddress.optional(),
  PLATFORM_WALLET: nonZeroAddress,
  MERCHANT_PAYOUT_ADDRESS: nonZeroAddress,
  LIQUIDITY_OPERATOR: nonZeroAddress.optional(),
  COMMISSION_RATE_BP: z.coerce.number().int().min(0).max(10_000).default(200),
  TOKEN_NAME: z.string().min(1).default('Platform Credit'),
  PORT: z.coerce.number().int().positive().default(3000),
  DATA_DIR: z.string().min(1).optional(),
});

export interface LedgerConfig {
  owner: Address;
  masterAdmin: Address;
  platformWallet: Address;
  merchantPayoutAddress: Address;
  liquidityOperator: Address;
  commissionRateBp: number;
  tokenName: string;
  port: number;
  dataDir?: string;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const message = JSON.stringify(parsed.error.flatten().fieldErrors, null, 2);
    throw new Error(`Invalid environment configuration: ${message}`);
  }

  const values = parsed.data;
  const masterAdmin = values.MASTER_ADMIN_ADDRESS ?? values.OWNER_ADDRESS;
  return {
    owner: values.OWNER_ADDRESS,
    masterAdmin,
    platformWallet: values.PLATFORM_WALLET,
    merchantPayoutAddress: values.MERCHANT_PAYOUT_ADDRESS,
    liquidityOperator: values.LIQUIDITY_OPERATOR ?? masterAdmin,
    commissionRateBp: values.COMMISSION_RATE_BP,
    tokenName: values.TOKEN_NAME,
    port: values.PORT,
    dataDir: values.DATA_DIR,
  };
}
