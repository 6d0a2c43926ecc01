import { App } from 'aws-cdk-lib';
import { Annotations, Match, Template } from 'aws-cdk-lib/assertions';
import { CloudWatchLogsFirehoseDeliveryStack, S3CompressionFormat } from '../src';

describe('CloudWatchLogsFirehoseDeliveryStack HTTP endpoint destination Testing', () => {
  const app = new App();

  const stack = new CloudWatchLogsFirehoseDeliveryStack(app, 'CloudWatchLogsHttpDeliveryStack', {
    env: {
      account: '123456789012',
      region: 'eu-west-2',
    },
    cloudWatchLogGroupNames: ['/aws/lambda/orders'],
    cloudWatchFilterPattern: '{ $.level = "ERROR" }',
    destinationHttpEndpoint: 'https://logs.example.com/ingest',
    s3CompressionFormat: S3CompressionFormat.GZIP,
    namePrefix: 'audit-logs',
    nameSuffix: 'fedcba9876543210',
  });

  const template = Template.fromStack(stack);

  describe('Delivery Stream Testing', () => {

    it('should deliver to the http endpoint only', () => {
      template.hasResourceProperties('AWS::KinesisFirehose::DeliveryStream', {
        DeliveryStreamName: 'audit-logs-fedcba9876543210',
        HttpEndpointDestinationConfiguration: {
          EndpointConfiguration: {
            Url: 'https://logs.example.com/ingest',
            Name: 'audit-logs-fedcba9876543210',
          },
          BufferingHints: {
            SizeInMBs: 5,
            IntervalInSeconds: 60,
          },
          RetryOptions: {
            DurationInSeconds: 300,
          },
          RequestConfiguration: {
            ContentEncoding: 'GZIP',
          },
          S3BackupMode: 'FailedDataOnly',
          CloudWatchLoggingOptions: {
            Enabled: true,
          },
        },
        ExtendedS3DestinationConfiguration: Match.absent(),
      });
    });

    it('should back up failed records to the error bucket', () => {
      template.hasResourceProperties('AWS::KinesisFirehose::DeliveryStream', {
        HttpEndpointDestinationConfiguration: {
          S3Configuration: {
            BucketARN: {
              'Fn::GetAtt': [Match.stringLikeRegexp('ErrorBucket.*'), 'Arn'],
            },
            RoleARN: {
              'Fn::GetAtt': [Match.stringLikeRegexp('FirehoseRole.*'), 'Arn'],
            },
            BufferingHints: {
              SizeInMBs: 10,
              IntervalInSeconds: 400,
            },
            CompressionFormat: 'GZIP',
            Prefix: 'failed/',
          },
        },
      });
    });

    it('should read endpoint credentials from the secret', () => {
      template.hasResourceProperties('AWS::KinesisFirehose::DeliveryStream', {
        HttpEndpointDestinationConfiguration: {
          SecretsManagerConfiguration: {
            Enabled: true,
            SecretARN: { Ref: Match.stringLikeRegexp('HttpEndpointSecret.*') },
            RoleARN: {
              'Fn::GetAtt': [Match.stringLikeRegexp('FirehoseRole.*'), 'Arn'],
            },
          },
        },
      });
    });

    it('should keep encryption on', () => {
      template.hasResourceProperties('AWS::KinesisFirehose::DeliveryStream', {
        DeliveryStreamEncryptionConfigurationInput: {
          KeyType: 'CUSTOMER_MANAGED_CMK',
        },
      });
    });
  });

  describe('Identity Testing', () => {

    it('should limit bucket access to the error bucket', () => {
      template.hasResourceProperties('AWS::IAM::ManagedPolicy', {
        ManagedPolicyName: 'audit-logs-firehose-fedcba9876543210',
        PolicyDocument: {
          Statement: Match.arrayWith([
            Match.objectLike({
              Sid: 'DeliveryBucketAccess',
              Resource: [
                { 'Fn::GetAtt': [Match.stringLikeRegexp('ErrorBucket.*'), 'Arn'] },
                {
                  'Fn::Join': [
                    '',
                    [
                      { 'Fn::GetAtt': [Match.stringLikeRegexp('ErrorBucket.*'), 'Arn'] },
                      '/*',
                    ],
                  ],
                },
              ],
            }),
          ]),
        },
      });
    });
  });

  describe('Subscription Filter Testing', () => {

    it('should subscribe the log group with the shared pattern', () => {
      template.resourceCountIs('AWS::Logs::SubscriptionFilter', 1);
      template.hasResourceProperties('AWS::Logs::SubscriptionFilter', {
        LogGroupName: '/aws/lambda/orders',
        FilterName: '/aws/lambda/orders-fedcba9876543210',
        FilterPattern: '{ $.level = "ERROR" }',
      });
    });
  });

  describe('Naming Testing', () => {

    it('should compose names from the prefix and suffix', () => {
      template.hasResourceProperties('AWS::S3::Bucket', {
        BucketName: 'audit-logs-errors-fedcba9876543210',
      });
      template.hasResourceProperties('AWS::SecretsManager::Secret', {
        Name: 'audit-logs-http-endpoint-fedcba9876543210',
      });
      template.hasResourceProperties('AWS::Logs::LogGroup', {
        LogGroupName: '/aws/kinesisfirehose/audit-logs-fedcba9876543210',
      });
    });

    it('should keep the alias prefix fixed', () => {
      template.hasResourceProperties('AWS::KMS::Alias', {
        AliasName: 'alias/cloud-platform-firehose-log-delivery-fedcba9876543210',
      });
    });
  });

  describe('Annotation Testing', () => {

    it('should not report the error bucket as unused', () => {
      Annotations.fromStack(stack).hasNoInfo('*', Match.stringLikeRegexp('Error bucket is provisioned but unused.*'));
    });
  });
});

describe('CloudWatchLogsFirehoseDeliveryStack without log groups Testing', () => {
  const app = new App();

  const stack = new CloudWatchLogsFirehoseDeliveryStack(app, 'CloudWatchLogsEmptyDeliveryStack', {
    env: {
      account: '123456789012',
      region: 'us-east-1',
    },
    cloudWatchLogGroupNames: [],
    destinationHttpEndpoint: 'https://logs.example.com/ingest',
    nameSuffix: '00000000ffffffff',
  });

  const template = Template.fromStack(stack);

  it('should have no subscription filter', () => {
    template.resourceCountIs('AWS::Logs::SubscriptionFilter', 0);
  });

  it('should not export subscription filter names', () => {
    expect(template.findOutputs('SubscriptionFilterNames')).toStrictEqual({});
  });

  it('should warn about the empty log group list', () => {
    Annotations.fromStack(stack).hasWarning('*', Match.stringLikeRegexp('cloudWatchLogGroupNames is empty.*'));
  });
});
