import * as cdk from 'aws-cdk-lib/core';
import { Construct } from 'constructs';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as s3 from 'aws-cdk-lib/aws-s3';
import * as apigatewayv2 from 'aws-cdk-lib/aws-apigatewayv2';
import { HttpLambdaIntegration } from 'aws-cdk-lib/aws-apigatewayv2-integrations';
import { NodejsFunction } from 'aws-cdk-lib/aws-lambda-nodejs';
import * as path from 'path';

/**
 * Properties for ResizeApiConstruct.
 */
export interface ResizeApiProps {
  /**
   * Source images referenced by `key` are read from here.
   */
  readonly uploadBucket: s3.IBucket;

  /**
   * Resized images are written here and presigned for download.
   */
  readonly resizedBucket: s3.IBucket;

  /**
   * The IAM role for Lambda execution.
   * This should be the base execution role with CloudWatch Logs permissions.
   */
  readonly executionRole: iam.IRole;

  /**
   * Box used when a request names no width/height.
   * @default 800 x 600
   */
  readonly defaultWidth?: number;
  readonly defaultHeight?: number;

  /**
   * Lifetime of the returned download URL.
   * @default 1 hour
   */
  readonly urlExpiry?: cdk.Duration;
}

/**
 * ResizeApiConstruct
 *
 * HTTP API in front of the ResizeImage Lambda.
 *
 * Routes:
 * - POST /resize
 * - GET /health
 *
 * The function gets read access to the upload bucket and write access to the
 * resized bucket. Read on the resized bucket is granted as well: a presigned
 * URL carries the permissions of the role that signed it.
 */
export class ResizeApiConstruct extends Construct {
  public readonly httpApi: apigatewayv2.HttpApi;

  public readonly resizeFunction: NodejsFunction;

  constructor(scope: Construct, id: string, props: ResizeApiProps) {
    super(scope, id);

    const urlExpiry = props.urlExpiry ?? cdk.Duration.hours(1);

    /**
     * ResizeImage Lambda Function
     *
     * sharp ships a native binary per platform, so it is left out of the
     * esbuild bundle and installed for linux-arm64 into the asset instead.
     * 1 GB of memory leaves room for decoding large sources.
     */
    this.resizeFunction = new NodejsFunction(this, 'ResizeImageFunction', {
      description: 'Resizes images from an inline payload or the upload bucket into the resized bucket',
      runtime: lambda.Runtime.NODEJS_20_X,
      architecture: lambda.Architecture.ARM_64,
      handler: 'handler',
      entry: path.join(__dirname, '..', '..', '..', 'backend', 'resize-image.ts'),
      role: props.executionRole,
      timeout: cdk.Duration.seconds(30),
      memorySize: 1024,
      environment: {
        UPLOAD_BUCKET: props.uploadBucket.bucketName,
        RESIZED_BUCKET: props.resizedBucket.bucketName,
        RESIZED_WIDTH: String(props.defaultWidth ?? 800),
        RESIZED_HEIGHT: String(props.defaultHeight ?? 600),
        PRESIGNED_URL_EXPIRES_IN: String(urlExpiry.toSeconds()),
      },
      bundling: {
        minify: true,
        sourceMap: true,
        target: 'node20',
        forceDockerBundling: false,
        nodeModules: ['sharp'],
        commandHooks: {
          beforeBundling(): string[] {
            return [];
          },
          beforeInstall(): string[] {
            return [];
          },
          afterBundling(_inputDir: string, outputDir: string): string[] {
            return [
              `cd ${outputDir}`,
              'rm -rf node_modules/sharp && npm install --cpu=arm64 --os=linux --libc=glibc sharp',
            ];
          },
        },
      },
    });

    props.uploadBucket.grantRead(this.resizeFunction);
    props.resizedBucket.grantReadWrite(this.resizeFunction);

    this.httpApi = new apigatewayv2.HttpApi(this, 'HttpApi', {
      apiName: 'ImageResizerApi',
      description: 'HTTP API for the image resize job',
      corsPreflight: {
        allowOrigins: ['*'],
        allowMethods: [
          apigatewayv2.CorsHttpMethod.GET,
          apigatewayv2.CorsHttpMethod.POST,
          apigatewayv2.CorsHttpMethod.OPTIONS,
        ],
        allowHeaders: ['Content-Type'],
      },
    });

    const resizeIntegration = new HttpLambdaIntegration('ResizeImageIntegration', this.resizeFunction);

    this.httpApi.addRoutes({
      path: '/resize',
      methods: [apigatewayv2.HttpMethod.POST],
      integration: resizeIntegration,
    });

    this.httpApi.addRoutes({
      path: '/health',
      methods: [apigatewayv2.HttpMethod.GET],
      integration: resizeIntegration,
    });
  }
}
