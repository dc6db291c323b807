import * as cdk from 'aws-cdk-lib/core';
import { Construct } from 'constructs';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as apigatewayv2 from 'aws-cdk-lib/aws-apigatewayv2';
import { NodejsFunction } from 'aws-cdk-lib/aws-lambda-nodejs';
import { CostAlerterConstruct, ResizeApiConstruct, StorageConstruct } from './constructs';

/**
 * Deployment settings, usually read from CDK context by the app entry point.
 */
export interface InfraStackProps extends cdk.StackProps {
  /** @default 10 */
  readonly alertThreshold?: number;
  /** @default 50 */
  readonly criticalThreshold?: number;
  /** @default 'aws-cost-alerts' */
  readonly ntfyTopic?: string;
  /** @default 'https://ntfy.sh' */
  readonly ntfyServer?: string;
  /** @default false */
  readonly enableAutoNuke?: boolean;
  /** @default true */
  readonly nukeDryRun?: boolean;
  /** @default false */
  readonly sendDailySummary?: boolean;
  /** @default 800 */
  readonly resizedWidth?: number;
  /** @default 600 */
  readonly resizedHeight?: number;
}

export class InfraStack extends cdk.Stack {
  /**
   * Execution role of the ResizeImage function.
   * Starts with CloudWatch Logs only; bucket grants are added by the API construct.
   */
  public readonly resizeExecutionRole: iam.Role;

  /**
   * Execution role of the CostAlerter function. Only this role holds stop and
   * terminate permissions.
   */
  public readonly costAlerterExecutionRole: iam.Role;

  public readonly uploadBucket: s3.Bucket;
  public readonly resizedBucket: s3.Bucket;
  public readonly httpApi: apigatewayv2.HttpApi;
  public readonly resizeFunction: NodejsFunction;
  public readonly costAlerterFunction: NodejsFunction;
  public readonly budgetTopic: sns.Topic;

  constructor(scope: Construct, id: string, props: InfraStackProps = {}) {
    super(scope, id, props);

    const alertThreshold = props.alertThreshold ?? 10;
    const criticalThreshold = props.criticalThreshold ?? 50;
    if (criticalThreshold < alertThreshold) {
      throw new Error(
        `criticalThreshold (${criticalThreshold}) must not be lower than alertThreshold (${alertThreshold})`
      );
    }

    this.resizeExecutionRole = this.createExecutionRole(
      'ResizeExecutionRole',
      'Execution role for the ResizeImage function'
    );
    this.costAlerterExecutionRole = this.createExecutionRole(
      'CostAlerterExecutionRole',
      'Execution role for the CostAlerter function'
    );

    const storage = new StorageConstruct(this, 'Storage');
    this.uploadBucket = storage.uploadBucket;
    this.resizedBucket = storage.resizedBucket;

    const resizeApi = new ResizeApiConstruct(this, 'ResizeApi', {
      uploadBucket: storage.uploadBucket,
      resizedBucket: storage.resizedBucket,
      executionRole: this.resizeExecutionRole,
      defaultWidth: props.resizedWidth,
      defaultHeight: props.resizedHeight,
    });
    this.httpApi = resizeApi.httpApi;
    this.resizeFunction = resizeApi.resizeFunction;

    const costAlerter = new CostAlerterConstruct(this, 'CostAlerter', {
      executionRole: this.costAlerterExecutionRole,
      alertThreshold,
      criticalThreshold,
      ntfyTopic: props.ntfyTopic ?? 'aws-cost-alerts',
      ntfyServer: props.ntfyServer ?? 'https://ntfy.sh',
      enableAutoNuke: props.enableAutoNuke,
      nukeDryRun: props.nukeDryRun,
      sendDailySummary: props.sendDailySummary,
    });
    this.costAlerterFunction = costAlerter.costAlerterFunction;
    this.budgetTopic = costAlerter.budgetTopic;

    new cdk.CfnOutput(this, 'ApiUrl', {
      value: resizeApi.httpApi.apiEndpoint,
      description: 'Base URL of the image resize API',
    });

    new cdk.CfnOutput(this, 'UploadBucketName', {
      value: storage.uploadBucket.bucketName,
      description: 'Name of the S3 bucket holding source images',
    });

    new cdk.CfnOutput(this, 'ResizedBucketName', {
      value: storage.resizedBucket.bucketName,
      description: 'Name of the S3 bucket receiving resized images',
    });

    new cdk.CfnOutput(this, 'ResizeFunctionName', {
      value: resizeApi.resizeFunction.functionName,
      description: 'Name of the ResizeImage Lambda function',
    });

    new cdk.CfnOutput(this, 'CostAlerterFunctionName', {
      value: costAlerter.costAlerterFunction.functionName,
      description: 'Name of the CostAlerter Lambda function',
    });

    new cdk.CfnOutput(this, 'BudgetTopicArn', {
      value: costAlerter.budgetTopic.topicArn,
      description: 'ARN of the SNS topic AWS Budgets publishes to',
    });
  }

  /**
   * Lambda role with the AWSLambdaBasicExecutionRole managed policy only
   * (logs:CreateLogGroup, logs:CreateLogStream, logs:PutLogEvents).
   * Function-specific permissions are attached by the owning construct.
   */
  private createExecutionRole(id: string, description: string): iam.Role {
    return new iam.Role(this, id, {
      description,
      assumedBy: new iam.ServicePrincipal('lambda.amazonaws.com'),
      managedPolicies: [
        iam.ManagedPolicy.fromAwsManagedPolicyName('service-role/AWSLambdaBasicExecutionRole'),
      ],
    });
  }
}
