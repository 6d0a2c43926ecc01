import { Lazy } from 'aws-cdk-lib';
import {
  DestinationConfigurationError,
  resolveDeliveryDestination,
} from '../../src';

describe('resolveDeliveryDestination testing', () => {

  it('Should select the S3 destination when only a bucket ARN is supplied', () => {
    expect(resolveDeliveryDestination({
      destinationBucketArn: 'arn:aws:s3:::dest',
    })).toStrictEqual({ kind: 'extended_s3', bucketArn: 'arn:aws:s3:::dest' });
  });

  it('Should select the HTTP endpoint destination when only an endpoint is supplied', () => {
    expect(resolveDeliveryDestination({
      destinationBucketArn: '',
      destinationHttpEndpoint: 'https://logs.example.com/ingest',
    })).toStrictEqual({ kind: 'http_endpoint', url: 'https://logs.example.com/ingest' });
  });

  it('Should treat blank inputs as not supplied', () => {
    expect(resolveDeliveryDestination({
      destinationBucketArn: '   ',
      destinationHttpEndpoint: 'https://logs.example.com/ingest',
    }).kind).toBe('http_endpoint');
  });

  it('Should reject a missing destination', () => {
    expect(() => resolveDeliveryDestination({ destinationBucketArn: '', destinationHttpEndpoint: '' }))
      .toThrow('one of destinationBucketArn or destinationHttpEndpoint must be supplied.');
  });

  it('Should reject both destinations', () => {
    expect(() => resolveDeliveryDestination({
      destinationBucketArn: 'arn:aws:s3:::dest',
      destinationHttpEndpoint: 'https://logs.example.com/ingest',
    })).toThrow(DestinationConfigurationError);
  });

  it('Should reject a plain http endpoint', () => {
    expect(() => resolveDeliveryDestination({
      destinationHttpEndpoint: 'http://logs.example.com/ingest',
    })).toThrow('destinationHttpEndpoint must be an https:// URL, got: http://logs.example.com/ingest');
  });

  it('Should accept an unresolved endpoint token without inspecting it', () => {
    const url = Lazy.string({ produce: () => 'http://resolved-later.example.com' });
    expect(resolveDeliveryDestination({ destinationHttpEndpoint: url })).toStrictEqual({ kind: 'http_endpoint', url });
  });
});
