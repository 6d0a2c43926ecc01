import { Annotations, ArnFormat, Duration, RemovalPolicy, Stack, Tags, Token } from 'aws-cdk-lib';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as firehose from 'aws-cdk-lib/aws-kinesisfirehose';
import * as kms from 'aws-cdk-lib/aws-kms';
import * as logs from 'aws-cdk-lib/aws-logs';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as secretsmanager from 'aws-cdk-lib/aws-secretsmanager';
import { Construct } from 'constructs';
import { DeliveryDestination, resolveDeliveryDestination } from './delivery-destination';
import { InputPropertyError } from './log-delivery-errors';
import {
  buildCloudWatchSubscriptionPolicyDocument,
  buildFirehoseDeliveryPolicyDocument,
  buildFirehoseKeyUsageStatement,
} from './log-delivery-policies';
import { resolveNameSuffix } from '../naming/name-suffix';

/**
 * Compression codecs Firehose can apply to objects written to the destination bucket.
 */
export enum S3CompressionFormat {
  UNCOMPRESSED = 'UNCOMPRESSED',
  GZIP = 'GZIP',
  ZIP = 'ZIP',
  SNAPPY = 'Snappy',
  HADOOP_SNAPPY = 'HADOOP_SNAPPY',
}

/**
 * Props for creating a CloudWatchLogsFirehoseDelivery construct.
 */
export interface CloudWatchLogsFirehoseDeliveryProps {
  /** Names of pre-existing CloudWatch Log groups; one subscription filter is created per name. */
  readonly cloudWatchLogGroupNames: string[];
  /**
   * Filter pattern shared by every subscription filter.
   * @default '' (all events)
   */
  readonly cloudWatchFilterPattern?: string;
  /** ARN of an existing bucket. Selects S3 delivery; exclusive with destinationHttpEndpoint. */
  readonly destinationBucketArn?: string;
  /** HTTPS endpoint URL. Selects HTTP endpoint delivery; exclusive with destinationBucketArn. */
  readonly destinationHttpEndpoint?: string;
  /**
   * Compression of objects delivered to the destination bucket.
   * @default S3CompressionFormat.UNCOMPRESSED
   */
  readonly s3CompressionFormat?: S3CompressionFormat;
  /** Tags applied to every resource the construct owns. */
  readonly tags?: Record<string, string>;
  /**
   * Leading part of every resource name: 1-36 lowercase alphanumerics or hyphens.
   * @default 'cloudwatch-export'
   */
  readonly namePrefix?: string;
  /**
   * 16 lowercase hex characters appended to every resource name.
   * The context value is shared app-wide, so a second construct in the same account and region needs its own.
   * @default the `logDelivery:nameSuffix` context value, else a random suffix
   */
  readonly nameSuffix?: string;
  /**
   * Display name of the HTTP endpoint.
   * @default the delivery stream name
   */
  readonly httpEndpointName?: string;
  /**
   * Retention of the delivery diagnostics log group.
   * @default logs.RetentionDays.THREE_MONTHS
   */
  readonly logRetention?: logs.RetentionDays;
}

const DEFAULT_NAME_PREFIX = 'cloudwatch-export';

// leaves room for "-cloudwatch-" and the suffix within the 64 character role name limit
const NAME_PREFIX_PATTERN = /^[a-z0-9][a-z0-9-]{0,35}$/;

// CloudWatch Logs caps subscription filter names at 512 characters
const MAX_FILTER_NAME_LENGTH = 512;

const DELIVERY_LOG_STREAM_NAME = 'DestinationDelivery';

const ERROR_OUTPUT_PREFIX = 'errors/!{firehose:error-output-type}/!{timestamp:yyyy/MM/dd}/';

/** Settings shared by both destination shapes. */
interface DestinationContext {
  readonly roleArn: string;
  readonly errorBucketArn: string;
  readonly secretArn: string;
  readonly endpointName: string;
  readonly compressionFormat: S3CompressionFormat;
  readonly cloudWatchLoggingOptions: firehose.CfnDeliveryStream.CloudWatchLoggingOptionsProperty;
}

type DestinationConfiguration = Pick<
firehose.CfnDeliveryStreamProps,
'extendedS3DestinationConfiguration' | 'httpEndpointDestinationConfiguration'
>;

/**
 * Renders exactly one destination block; the other key is left out entirely.
 */
const renderDestinationConfiguration = (destination: DeliveryDestination, context: DestinationContext): DestinationConfiguration => {
  switch (destination.kind) {
    case 'extended_s3':
      return {
        extendedS3DestinationConfiguration: {
          bucketArn: destination.bucketArn,
          roleArn: context.roleArn,
          bufferingHints: {
            sizeInMBs: 64,
            intervalInSeconds: 60,
          },
          compressionFormat: context.compressionFormat,
          prefix: 'logs/!{timestamp:yyyy/MM/dd}/',
          errorOutputPrefix: ERROR_OUTPUT_PREFIX,
          dynamicPartitioningConfiguration: {
            enabled: false,
          },
          cloudWatchLoggingOptions: context.cloudWatchLoggingOptions,
        },
      };
    case 'http_endpoint':
      return {
        httpEndpointDestinationConfiguration: {
          endpointConfiguration: {
            url: destination.url,
            name: context.endpointName,
          },
          roleArn: context.roleArn,
          bufferingHints: {
            sizeInMBs: 5,
            intervalInSeconds: 60,
          },
          retryOptions: {
            durationInSeconds: 300,
          },
          requestConfiguration: {
            contentEncoding: 'GZIP',
          },
          secretsManagerConfiguration: {
            enabled: true,
            roleArn: context.roleArn,
            secretArn: context.secretArn,
          },
          s3BackupMode: 'FailedDataOnly',
          s3Configuration: {
            bucketArn: context.errorBucketArn,
            roleArn: context.roleArn,
            bufferingHints: {
              sizeInMBs: 10,
              intervalInSeconds: 400,
            },
            compressionFormat: 'GZIP',
            prefix: 'failed/',
            errorOutputPrefix: ERROR_OUTPUT_PREFIX,
            cloudWatchLoggingOptions: context.cloudWatchLoggingOptions,
          },
          cloudWatchLoggingOptions: context.cloudWatchLoggingOptions,
        },
      };
  }
};

/**
 * CDK construct that forwards CloudWatch Log groups to a Firehose delivery stream.
 * The stream delivers to either an S3 bucket or an HTTP endpoint, encrypted with its own KMS key.
 * Failed HTTP deliveries are backed up to an error bucket that the construct always provisions.
 */
export class CloudWatchLogsFirehoseDelivery extends Construct {
  /** Suffix embedded in every resource name. */
  public readonly nameSuffix: string;
  public readonly destination: DeliveryDestination;
  public readonly deliveryStream: firehose.CfnDeliveryStream;
  public readonly deliveryStreamName: string;
  public readonly deliveryStreamArn: string;
  public readonly encryptionKey: kms.Key;
  /** Role assumed by Firehose to write to its destinations. */
  public readonly firehoseRole: iam.Role;
  /** Role assumed by CloudWatch Logs to put subscribed events on the stream. */
  public readonly cloudWatchRole: iam.Role;
  public readonly errorBucket: s3.Bucket;
  /** Secret holding HTTP endpoint credentials. Its value is populated outside of this construct. */
  public readonly httpEndpointSecret: secretsmanager.CfnSecret;
  public readonly httpEndpointSecretArn: string;
  /** Log group receiving delivery diagnostics. */
  public readonly logGroup: logs.LogGroup;
  public readonly subscriptionFilters: logs.CfnSubscriptionFilter[];
  public readonly subscriptionFilterNames: string[];

  /**
   * Creates the delivery pipeline.
   *
   * @param scope - Parent construct (e.g. Stack).
   * @param id - Construct ID.
   * @param props - Log groups to subscribe, the destination, and naming overrides.
   * @throws DestinationConfigurationError if neither or both destinations are supplied.
   * @throws InputPropertyError if a name, suffix or log group list is malformed.
   */
  constructor(scope: Construct, id: string, props: CloudWatchLogsFirehoseDeliveryProps) {
    super(scope, id);

    const stack = Stack.of(this);

    const namePrefix = props.namePrefix ?? DEFAULT_NAME_PREFIX;
    if (Token.isUnresolved(namePrefix) || !NAME_PREFIX_PATTERN.test(namePrefix)) {
      throw new InputPropertyError(`namePrefix must be 1-36 lowercase alphanumerics or hyphens starting with an alphanumeric, got: ${namePrefix}`);
    }
    const logGroupNames = props.cloudWatchLogGroupNames;
    if (logGroupNames.some((name) => !Token.isUnresolved(name) && name.trim() === '')) {
      throw new InputPropertyError('cloudWatchLogGroupNames must not contain empty names.');
    }
    const duplicates = logGroupNames.filter((name, index) => logGroupNames.indexOf(name) !== index);
    if (duplicates.length > 0) {
      throw new InputPropertyError(`cloudWatchLogGroupNames contains duplicates: ${[...new Set(duplicates)].join(', ')}`);
    }

    this.destination = resolveDeliveryDestination(props);
    this.nameSuffix = resolveNameSuffix(this, props.nameSuffix);
    this.deliveryStreamName = `${namePrefix}-${this.nameSuffix}`;
    this.subscriptionFilterNames = logGroupNames.map((logGroupName) => `${logGroupName}-${this.nameSuffix}`);
    const overlong = this.subscriptionFilterNames.find((name) => !Token.isUnresolved(name) && name.length > MAX_FILTER_NAME_LENGTH);
    if (overlong !== undefined) {
      throw new InputPropertyError(`subscription filter name exceeds ${MAX_FILTER_NAME_LENGTH} characters: ${overlong}`);
    }

    // 👇 Tag every owned resource
    for (const [key, value] of Object.entries(props.tags ?? {})) {
      Tags.of(this).add(key, value);
    }

    // 👇 Create Firehose delivery role
    this.firehoseRole = new iam.Role(this, 'FirehoseRole', {
      roleName: `${namePrefix}-firehose-${this.nameSuffix}`,
      description: `Firehose delivery role for ${this.deliveryStreamName}.`,
      assumedBy: new iam.ServicePrincipal('firehose.amazonaws.com').withConditions({
        StringEquals: {
          'aws:SourceAccount': stack.account,
        },
      }),
    });

    // 👇 Create CloudWatch Logs subscription role
    this.cloudWatchRole = new iam.Role(this, 'CloudWatchRole', {
      roleName: `${namePrefix}-cloudwatch-${this.nameSuffix}`,
      description: `CloudWatch Logs subscription role for ${this.deliveryStreamName}.`,
      assumedBy: new iam.ServicePrincipal('logs.amazonaws.com').withConditions({
        StringLike: {
          'aws:SourceArn': `arn:aws:logs:${stack.region}:${stack.account}:*`,
        },
      }),
    });

    // 👇 Create KMS Key
    this.encryptionKey = new kms.Key(this, 'EncryptionKey', {
      description: `Encrypts Firehose delivery stream ${this.deliveryStreamName}.`,
      enableKeyRotation: true,
      pendingWindow: Duration.days(7),
      removalPolicy: RemovalPolicy.DESTROY,
    });
    this.encryptionKey.addToResourcePolicy(buildFirehoseKeyUsageStatement(this.firehoseRole.roleArn));
    new kms.Alias(this, 'EncryptionKeyAlias', {
      aliasName: `alias/cloud-platform-firehose-log-delivery-${this.nameSuffix}`,
      targetKey: this.encryptionKey,
      removalPolicy: RemovalPolicy.DESTROY,
    });

    // 👇 Create Error Bucket
    this.errorBucket = new s3.Bucket(this, 'ErrorBucket', {
      bucketName: `${namePrefix}-errors-${this.nameSuffix}`,
      encryption: s3.BucketEncryption.S3_MANAGED,
      blockPublicAccess: s3.BlockPublicAccess.BLOCK_ALL,
      enforceSSL: true,
      lifecycleRules: [
        {
          id: 'expire-error-records',
          enabled: true,
          expiration: Duration.days(14),
        },
        {
          id: 'abort-incomplete-multipart-uploads',
          enabled: true,
          abortIncompleteMultipartUploadAfter: Duration.days(7),
        },
      ],
      removalPolicy: RemovalPolicy.DESTROY,
      autoDeleteObjects: true,
    });
    if (this.destination.kind === 'extended_s3') {
      Annotations.of(this.errorBucket).addInfo('Error bucket is provisioned but unused: failed-record backup only applies to HTTP endpoint delivery.');
    }

    // 👇 Create HTTP endpoint credentials secret (value is set out of band)
    this.httpEndpointSecret = new secretsmanager.CfnSecret(this, 'HttpEndpointSecret', {
      name: `${namePrefix}-http-endpoint-${this.nameSuffix}`,
      description: `HTTP endpoint credentials for Firehose delivery stream ${this.deliveryStreamName}.`,
      kmsKeyId: this.encryptionKey.keyArn,
    });
    this.httpEndpointSecret.applyRemovalPolicy(RemovalPolicy.DESTROY);
    this.httpEndpointSecretArn = this.httpEndpointSecret.ref;

    // 👇 Create diagnostics Log Group
    const logGroupName = `/aws/kinesisfirehose/${this.deliveryStreamName}`;
    this.logGroup = new logs.LogGroup(this, 'DeliveryLogGroup', {
      logGroupName,
      retention: props.logRetention ?? logs.RetentionDays.THREE_MONTHS,
      removalPolicy: RemovalPolicy.DESTROY,
    });
    const logStream = new logs.LogStream(this, 'DeliveryLogStream', {
      logGroup: this.logGroup,
      logStreamName: DELIVERY_LOG_STREAM_NAME,
      removalPolicy: RemovalPolicy.DESTROY,
    });

    // the stream ARN is formatted from its name so the role policy can exist before the stream
    const formattedDeliveryStreamArn = stack.formatArn({
      service: 'firehose',
      resource: 'deliverystream',
      resourceName: this.deliveryStreamName,
    });

    const firehosePolicy = new iam.ManagedPolicy(this, 'FirehosePolicy', {
      managedPolicyName: `${namePrefix}-firehose-${this.nameSuffix}`,
      description: `Firehose delivery permissions for ${this.deliveryStreamName}.`,
      document: buildFirehoseDeliveryPolicyDocument({
        bucketArns: this.destination.kind === 'extended_s3'
          ? [this.destination.bucketArn, this.errorBucket.bucketArn]
          : [this.errorBucket.bucketArn],
        keyArn: this.encryptionKey.keyArn,
        logStreamArn: stack.formatArn({
          service: 'logs',
          resource: 'log-group',
          resourceName: `${logGroupName}:log-stream:${DELIVERY_LOG_STREAM_NAME}`,
          arnFormat: ArnFormat.COLON_RESOURCE_NAME,
        }),
        secretArn: this.httpEndpointSecretArn,
        deliveryStreamArn: formattedDeliveryStreamArn,
      }),
      roles: [this.firehoseRole],
    });

    // 👇 Create Firehose Delivery Stream
    this.deliveryStream = new firehose.CfnDeliveryStream(this, 'DeliveryStream', {
      deliveryStreamName: this.deliveryStreamName,
      deliveryStreamType: 'DirectPut',
      deliveryStreamEncryptionConfigurationInput: {
        keyType: 'CUSTOMER_MANAGED_CMK',
        keyArn: this.encryptionKey.keyArn,
      },
      ...renderDestinationConfiguration(this.destination, {
        roleArn: this.firehoseRole.roleArn,
        errorBucketArn: this.errorBucket.bucketArn,
        secretArn: this.httpEndpointSecretArn,
        endpointName: props.httpEndpointName ?? this.deliveryStreamName,
        compressionFormat: props.s3CompressionFormat ?? S3CompressionFormat.UNCOMPRESSED,
        cloudWatchLoggingOptions: {
          enabled: true,
          logGroupName: this.logGroup.logGroupName,
          logStreamName: logStream.logStreamName,
        },
      }),
    });
    // Firehose checks its role's permissions on creation
    this.deliveryStream.node.addDependency(firehosePolicy);
    this.deliveryStreamArn = this.deliveryStream.attrArn;

    const cloudWatchPolicy = new iam.ManagedPolicy(this, 'CloudWatchPolicy', {
      managedPolicyName: `${namePrefix}-cloudwatch-${this.nameSuffix}`,
      description: `CloudWatch Logs subscription permissions for ${this.deliveryStreamName}.`,
      document: buildCloudWatchSubscriptionPolicyDocument(this.deliveryStreamArn),
      roles: [this.cloudWatchRole],
    });

    // 👇 Subscribe each Log Group to the stream
    if (logGroupNames.length === 0) {
      Annotations.of(this).addWarningV2('@log-delivery:noLogGroups', 'cloudWatchLogGroupNames is empty; no log group is subscribed to the delivery stream.');
    }
    // IDs are keyed by position: '/' in a name is rewritten in construct IDs and names could collide
    this.subscriptionFilters = this.subscriptionFilterNames.map((filterName, index) => {
      const filter = new logs.CfnSubscriptionFilter(this, `SubscriptionFilter${index}`, {
        filterName,
        logGroupName: logGroupNames[index],
        filterPattern: props.cloudWatchFilterPattern ?? '',
        destinationArn: this.deliveryStreamArn,
        roleArn: this.cloudWatchRole.roleArn,
      });
      filter.node.addDependency(cloudWatchPolicy);
      return filter;
    });
  }
}
