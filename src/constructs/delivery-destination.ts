import { Token } from 'aws-cdk-lib';
import { DestinationConfigurationError } from './log-delivery-errors';

/**
 * Deliver log records to an existing S3 bucket.
 */
export interface S3DeliveryDestination {
  readonly kind: 'extended_s3';
  /** ARN of the pre-existing destination bucket. */
  readonly bucketArn: string;
}

/**
 * Deliver log records to an HTTPS endpoint, authenticated with the construct's secret.
 */
export interface HttpEndpointDeliveryDestination {
  readonly kind: 'http_endpoint';
  readonly url: string;
}

export type DeliveryDestination = S3DeliveryDestination | HttpEndpointDeliveryDestination;

/**
 * The two optional destination inputs, of which exactly one must be non-empty.
 */
export interface DeliveryDestinationInput {
  readonly destinationBucketArn?: string;
  readonly destinationHttpEndpoint?: string;
}

const isSupplied = (value: string | undefined): value is string =>
  value !== undefined && (Token.isUnresolved(value) || value.trim() !== '');

/**
 * Builds the destination union from the two optional inputs.
 * Unresolved tokens count as supplied and are not inspected further.
 *
 * @throws DestinationConfigurationError if neither or both inputs are supplied,
 *   or if a literal endpoint does not use https.
 */
export const resolveDeliveryDestination = (input: DeliveryDestinationInput): DeliveryDestination => {
  const hasBucket = isSupplied(input.destinationBucketArn);
  const hasEndpoint = isSupplied(input.destinationHttpEndpoint);

  if (hasBucket && hasEndpoint) {
    throw new DestinationConfigurationError('destinationBucketArn and destinationHttpEndpoint are mutually exclusive; supply only one.');
  }
  if (isSupplied(input.destinationBucketArn)) {
    return { kind: 'extended_s3', bucketArn: input.destinationBucketArn };
  }
  if (isSupplied(input.destinationHttpEndpoint)) {
    const url = input.destinationHttpEndpoint;
    if (!Token.isUnresolved(url) && !url.startsWith('https://')) {
      throw new DestinationConfigurationError(`destinationHttpEndpoint must be an https:// URL, got: ${url}`);
    }
    return { kind: 'http_endpoint', url };
  }
  throw new DestinationConfigurationError('one of destinationBucketArn or destinationHttpEndpoint must be supplied.');
};
