import { CfnOutput, Stack, StackProps } from 'aws-cdk-lib';
import { Construct } from 'constructs';
import {
  CloudWatchLogsFirehoseDelivery,
  CloudWatchLogsFirehoseDeliveryProps,
} from '../constructs/cloudwatch-logs-firehose-delivery';

/**
 * Props for the CloudWatchLogsFirehoseDeliveryStack.
 * Extends StackProps with the delivery construct's configuration.
 */
export interface CloudWatchLogsFirehoseDeliveryStackProps extends StackProps, CloudWatchLogsFirehoseDeliveryProps {}

/**
 * CDK Stack that deploys a CloudWatch Logs to Firehose delivery pipeline and exports its identifiers.
 */
export class CloudWatchLogsFirehoseDeliveryStack extends Stack {
  public readonly delivery: CloudWatchLogsFirehoseDelivery;

  /**
   * Creates the stack, the delivery construct and its outputs.
   *
   * @param scope - Parent construct (e.g. App).
   * @param id - Stack ID.
   * @param props - Stack props plus the log groups and destination to deliver to.
   */
  constructor(scope: Construct, id: string, props: CloudWatchLogsFirehoseDeliveryStackProps) {
    super(scope, id, props);

    this.delivery = new CloudWatchLogsFirehoseDelivery(this, 'CloudWatchLogsFirehoseDelivery', {
      cloudWatchLogGroupNames: props.cloudWatchLogGroupNames,
      cloudWatchFilterPattern: props.cloudWatchFilterPattern,
      destinationBucketArn: props.destinationBucketArn,
      destinationHttpEndpoint: props.destinationHttpEndpoint,
      s3CompressionFormat: props.s3CompressionFormat,
      tags: props.tags,
      namePrefix: props.namePrefix,
      nameSuffix: props.nameSuffix,
      httpEndpointName: props.httpEndpointName,
      logRetention: props.logRetention,
    });

    new CfnOutput(this, 'DeliveryStreamName', { value: this.delivery.deliveryStreamName });
    new CfnOutput(this, 'DeliveryStreamArn', { value: this.delivery.deliveryStreamArn });
    new CfnOutput(this, 'KmsKeyArn', { value: this.delivery.encryptionKey.keyArn });
    new CfnOutput(this, 'FirehoseRoleName', { value: this.delivery.firehoseRole.roleName });
    new CfnOutput(this, 'FirehoseRoleArn', { value: this.delivery.firehoseRole.roleArn });
    new CfnOutput(this, 'CloudWatchRoleName', { value: this.delivery.cloudWatchRole.roleName });
    new CfnOutput(this, 'CloudWatchRoleArn', { value: this.delivery.cloudWatchRole.roleArn });
    // CloudFormation rejects an empty output value
    if (this.delivery.subscriptionFilterNames.length > 0) {
      new CfnOutput(this, 'SubscriptionFilterNames', { value: this.delivery.subscriptionFilterNames.join(',') });
    }
    new CfnOutput(this, 'HttpEndpointSecretArn', { value: this.delivery.httpEndpointSecretArn });
    new CfnOutput(this, 'LogGroupName', { value: this.delivery.logGroup.logGroupName });
  }
}
