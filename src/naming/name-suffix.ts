import * as crypto from 'crypto';
import { Token } from 'aws-cdk-lib';
import { Construct } from 'constructs';
import { InputPropertyError } from '../constructs/log-delivery-errors';

/** CDK context key that pins the suffix across synthesis runs. */
export const NAME_SUFFIX_CONTEXT_KEY = 'logDelivery:nameSuffix';

/** Number of random bytes behind a suffix (16 hex characters). */
const NAME_SUFFIX_BYTES = 8;

const NAME_SUFFIX_PATTERN = /^[0-9a-f]{16}$/;

/**
 * Generates a fresh suffix: 8 random bytes, hex encoded.
 */
export const generateNameSuffix = (): string => crypto.randomBytes(NAME_SUFFIX_BYTES).toString('hex');

/**
 * Resolves the suffix shared by every resource name of one delivery construct.
 * An explicit value wins, then the `logDelivery:nameSuffix` context value, then a generated one.
 * The context value applies app-wide: every construct pinned through it shares one suffix,
 * and so one key alias name. Pin a second construct in the same account and region
 * with its own `nameSuffix` instead.
 *
 * @param scope - Construct whose context is consulted.
 * @param explicit - Suffix passed through construct props.
 * @throws InputPropertyError if a supplied suffix is not 16 lowercase hex characters,
 *   or the context value is not a string.
 */
export const resolveNameSuffix = (scope: Construct, explicit?: string): string => {
  const fromContext: unknown = scope.node.tryGetContext(NAME_SUFFIX_CONTEXT_KEY);
  if (explicit === undefined && fromContext !== undefined && typeof fromContext !== 'string') {
    throw new InputPropertyError(`${NAME_SUFFIX_CONTEXT_KEY} context must be a string, got: ${JSON.stringify(fromContext)}`);
  }
  const supplied = explicit ?? (typeof fromContext === 'string' ? fromContext : undefined);
  if (supplied === undefined) {
    return generateNameSuffix();
  }
  if (Token.isUnresolved(supplied) || !NAME_SUFFIX_PATTERN.test(supplied)) {
    throw new InputPropertyError(`nameSuffix must be 16 lowercase hex characters, got: ${supplied}`);
  }
  return supplied;
};
