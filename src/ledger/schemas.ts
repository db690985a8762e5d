/**
 * Zod schemas shared by persisted module state and the HTTP layer.
 */

import { getAddress, isAddress } from 'ethers';
import { z } from 'zod';

export const addressSchema = z
  .string()
  .refine(value => isAddress(value), { message: 'Invalid address' })
  .transform(value => getAddress(value));

export const timestampSchema = z.number().int().nonnegative();

export const adminProfileSchema = z.object({
  address: addressSchema,
  addedBy: addressSchema,
  addedAt: timestampSchema,
});

export const merchantProfileSchema = z.object({
  address: addressSchema,
  addedBy: addressSchema,
  addedAt: timestampSchema,
  balance: z.bigint().nonnegative(),
});

export const productSchema = z.object({
  id: z.string().min(1),
  addedBy: addressSchema,
  addedAt: timestampSchema,
  updatedAt: timestampSchema,
  imageReference: z.string(),
  metadataReference: z.string(),
  merchantAddress: addressSchema,
});

export const orderSchema = z.object({
  orderId: z.number().int().positive(),
  createdBy: addressSchema,
  orderReference: z.string(),
  totalAmount: z.bigint().positive(),
  commission: z.bigint().nonnegative(),
  merchantPayout: z.bigint().nonnegative(),
  createdAt: timestampSchema,
});

/**
 * Token amounts arrive over HTTP as decimal strings, or as numbers when they
 * are safe integers. Larger numbers were already rounded by JSON.parse.
 */
export const amountSchema = z
  .union([
    z.string().regex(/^\d+$/, 'Amount must be a non-negative integer'),
    z.number().int().nonnegative().safe('Amounts above 2^53 - 1 must be sent as strings'),
  ])
  .transform(value => BigInt(value));
