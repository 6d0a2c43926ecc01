/**
 * Public API for the CloudWatch Logs to Firehose delivery package.
 * Re-exports the delivery construct, its stack, and the helpers they are built from.
 */
export * from './constructs/cloudwatch-logs-firehose-delivery';
export * from './constructs/delivery-destination';
export * from './constructs/log-delivery-errors';
export * from './constructs/log-delivery-policies';
export * from './naming/name-suffix';
export * from './stacks/cloudwatch-logs-firehose-delivery-stack';
