/**
 * Ledger error taxonomy
 *
 * Every rejected operation throws a LedgerError whose `code` is a
 * discriminated reason value. Callers branch on `code` (or `category`),
 * never on the message text.
 */

export type LedgerErrorCode =
  | 'AlreadyAdmin'
  | 'AlreadyMerchant'
  | 'ProductExists'
  | 'NotAdmin'
  | 'NotMerchant'
  | 'MerchantNotFound'
  | 'ProductNotFound'
  | 'OrderNotFound'
  | 'AccessDenied'
  | 'ApprovedOperatorsOnly'
  | 'ZeroAddress'
  | 'InvalidArgument'
  | 'NonMatchingAddress'
  | 'ExternalCallFailed'
  | 'NoActiveCall';

export type LedgerErrorCategory =
  | 'AlreadyExists'
  | 'NotFound'
  | 'AccessDenied'
  | 'InvalidArgument'
  | 'ExternalCallFailed'
  | 'Host';

const CATEGORIES: Record<LedgerErrorCode, LedgerErrorCategory> = {
  AlreadyAdmin: 'AlreadyExists',
  AlreadyMerchant: 'AlreadyExists',
  ProductExists: 'AlreadyExists',
  NotAdmin: 'NotFound',
  NotMerchant: 'NotFound',
  MerchantNotFound: 'NotFound',
  ProductNotFound: 'NotFound',
  OrderNotFound: 'NotFound',
  AccessDenied: 'AccessDenied',
  ApprovedOperatorsOnly: 'AccessDenied',
  ZeroAddress: 'InvalidArgument',
  InvalidArgument: 'InvalidArgument',
  NonMatchingAddress: 'InvalidArgument',
  ExternalCallFailed: 'ExternalCallFailed',
  NoActiveCall: 'Host',
};

export interface LedgerErrorDetails {
  // The conflicting record for AlreadyExists errors
  existing?: unknown;
  [key: string]: unknown;
}

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly category: LedgerErrorCategory;
  readonly details: LedgerErrorDetails;

  constructor(code: LedgerErrorCode, message: string, details: LedgerErrorDetails = {}) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    this.category = CATEGORIES[code];
    this.details = details;
  }

  get existing(): unknown {
    return this.details.existing;
  }
}

export function isLedgerError(error: unknown, code?: LedgerErrorCode): error is LedgerError {
  if (!(error instanceof LedgerError)) return false;
  return code === undefined || error.code === code;
}
