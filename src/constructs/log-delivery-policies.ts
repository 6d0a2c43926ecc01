import * as iam from 'aws-cdk-lib/aws-iam';

/**
 * Resources the Firehose delivery role works against.
 */
export interface FirehoseDeliveryPolicyResources {
  /** Bucket ARNs Firehose writes to: the error bucket, plus the destination bucket on the S3 branch. */
  readonly bucketArns: string[];
  readonly keyArn: string;
  /** ARN of the diagnostics log stream. */
  readonly logStreamArn: string;
  readonly secretArn: string;
  readonly deliveryStreamArn: string;
}

/** Actions Firehose needs on its destination and backup buckets. */
export const FIREHOSE_BUCKET_ACTIONS = [
  's3:AbortMultipartUpload',
  's3:GetBucketLocation',
  's3:GetObject',
  's3:ListBucket',
  's3:ListBucketMultipartUploads',
  's3:PutObject',
];

/** Actions the Firehose role is granted in the key policy. */
export const FIREHOSE_KEY_ACTIONS = [
  'kms:Encrypt',
  'kms:Decrypt',
  'kms:ReEncrypt*',
  'kms:GenerateDataKey*',
  'kms:DescribeKey',
];

/**
 * Permission policy of the Firehose delivery role.
 */
export const buildFirehoseDeliveryPolicyDocument = (resources: FirehoseDeliveryPolicyResources): iam.PolicyDocument =>
  new iam.PolicyDocument({
    statements: [
      new iam.PolicyStatement({
        sid: 'DeliveryBucketAccess',
        effect: iam.Effect.ALLOW,
        actions: FIREHOSE_BUCKET_ACTIONS,
        resources: resources.bucketArns.flatMap((arn) => [arn, `${arn}/*`]),
      }),
      new iam.PolicyStatement({
        sid: 'DeliveryKeyUsage',
        effect: iam.Effect.ALLOW,
        actions: [
          'kms:Decrypt',
          'kms:GenerateDataKey',
        ],
        resources: [resources.keyArn],
      }),
      new iam.PolicyStatement({
        sid: 'DeliveryDiagnosticsLogging',
        effect: iam.Effect.ALLOW,
        actions: ['logs:PutLogEvents'],
        resources: [resources.logStreamArn],
      }),
      new iam.PolicyStatement({
        sid: 'HttpEndpointSecretAccess',
        effect: iam.Effect.ALLOW,
        actions: ['secretsmanager:GetSecretValue'],
        resources: [resources.secretArn],
      }),
      new iam.PolicyStatement({
        sid: 'HttpEndpointDelivery',
        effect: iam.Effect.ALLOW,
        actions: [
          'firehose:DescribeDeliveryStream',
          'firehose:PutRecord',
          'firehose:PutRecordBatch',
        ],
        resources: [resources.deliveryStreamArn],
      }),
    ],
  });

/**
 * Permission policy of the role CloudWatch Logs assumes to forward subscribed events.
 */
export const buildCloudWatchSubscriptionPolicyDocument = (deliveryStreamArn: string): iam.PolicyDocument =>
  new iam.PolicyDocument({
    statements: [
      new iam.PolicyStatement({
        sid: 'SubscriptionPutRecord',
        effect: iam.Effect.ALLOW,
        actions: ['firehose:PutRecord'],
        resources: [deliveryStreamArn],
      }),
    ],
  });

/**
 * Key policy statement letting the Firehose role use the delivery key.
 * In a key policy the `*` resource means the key itself.
 *
 * @param firehoseRoleArn - Exact ARN of the Firehose role.
 */
export const buildFirehoseKeyUsageStatement = (firehoseRoleArn: string): iam.PolicyStatement =>
  new iam.PolicyStatement({
    sid: 'AllowFirehoseRoleUseOfKey',
    effect: iam.Effect.ALLOW,
    principals: [new iam.ArnPrincipal(firehoseRoleArn)],
    actions: FIREHOSE_KEY_ACTIONS,
    resources: ['*'],
  });
