import * as cdk from 'aws-cdk-lib/core';
import { Construct } from 'constructs';
import * as lambda from 'aws-cdk-lib/aws-lambda';
import * as iam from 'aws-cdk-lib/aws-iam';
import * as sns from 'aws-cdk-lib/aws-sns';
import * as subscriptions from 'aws-cdk-lib/aws-sns-subscriptions';
import * as events from 'aws-cdk-lib/aws-events';
import * as targets from 'aws-cdk-lib/aws-events-targets';
import * as budgets from 'aws-cdk-lib/aws-budgets';
import { NodejsFunction } from 'aws-cdk-lib/aws-lambda-nodejs';
import * as path from 'path';

/**
 * Tag key that opts a resource in to termination. Must match the backend.
 */
export const NUKE_TAG_KEY = 'CanNuke';

/**
 * Properties for CostAlerterConstruct.
 */
export interface CostAlerterProps {
  /**
   * The IAM role for Lambda execution.
   * Cost Explorer, describe and stop/terminate permissions are added to it.
   */
  readonly executionRole: iam.IRole;

  /** Month-to-date USD spend that triggers an alert. */
  readonly alertThreshold: number;

  /** Month-to-date USD spend that triggers the critical path. */
  readonly criticalThreshold: number;

  readonly ntfyTopic: string;
  readonly ntfyServer: string;

  /**
   * Run the nuke pass at the critical level.
   * @default false
   */
  readonly enableAutoNuke?: boolean;

  /**
   * Report what the nuke pass would do instead of doing it.
   * @default true
   */
  readonly nukeDryRun?: boolean;

  /**
   * Notify below the alert threshold too.
   * @default false
   */
  readonly sendDailySummary?: boolean;

  /**
   * When the daily check runs.
   * @default 09:00 UTC every day
   */
  readonly schedule?: events.Schedule;
}

/**
 * CostAlerterConstruct
 *
 * The CostAlerter Lambda and everything that invokes it:
 * - an EventBridge rule running the daily check
 * - an SNS topic that an AWS Budget publishes to, subscribed by the Lambda
 * - the monthly cost budget itself, notifying at the alert threshold and at
 *   the critical threshold
 *
 * The IAM policy mirrors the tag gate of the nuke pass: stopping is allowed on
 * any instance or database, terminating and deleting only on resources tagged
 * `CanNuke=true`.
 */
export class CostAlerterConstruct extends Construct {
  public readonly costAlerterFunction: NodejsFunction;

  public readonly budgetTopic: sns.Topic;

  public readonly scheduleRule: events.Rule;

  public readonly budget: budgets.CfnBudget;

  constructor(scope: Construct, id: string, props: CostAlerterProps) {
    super(scope, id);

    const stack = cdk.Stack.of(this);

    this.costAlerterFunction = new NodejsFunction(this, 'CostAlerterFunction', {
      description: 'Checks month-to-date AWS spend, sends ntfy alerts and optionally stops expensive resources',
      runtime: lambda.Runtime.NODEJS_20_X,
      architecture: lambda.Architecture.ARM_64,
      handler: 'handler',
      entry: path.join(__dirname, '..', '..', '..', 'backend', 'cost-alerter.ts'),
      role: props.executionRole,
      // A live nuke pass describes and stops resources one by one
      timeout: cdk.Duration.minutes(5),
      memorySize: 256,
      environment: {
        ALERT_THRESHOLD: String(props.alertThreshold),
        CRITICAL_THRESHOLD: String(props.criticalThreshold),
        NTFY_TOPIC: props.ntfyTopic,
        NTFY_SERVER: props.ntfyServer,
        ENABLE_AUTO_NUKE: String(props.enableAutoNuke ?? false),
        NUKE_DRY_RUN: String(props.nukeDryRun ?? true),
        SEND_DAILY_SUMMARY: String(props.sendDailySummary ?? false),
      },
      bundling: {
        minify: true,
        sourceMap: true,
        target: 'node20',
        forceDockerBundling: false,
      },
    });

    this.costAlerterFunction.addToRolePolicy(
      new iam.PolicyStatement({
        sid: 'ReadCosts',
        actions: ['ce:GetCostAndUsage', 'ce:GetCostForecast'],
        resources: ['*'],
      })
    );

    this.costAlerterFunction.addToRolePolicy(
      new iam.PolicyStatement({
        sid: 'DescribeResources',
        actions: ['ec2:DescribeInstances', 'ec2:DescribeNatGateways', 'rds:DescribeDBInstances'],
        resources: ['*'],
      })
    );

    // Counted for the critical alert only
    this.costAlerterFunction.addToRolePolicy(
      new iam.PolicyStatement({
        sid: 'ListInventory',
        actions: ['lambda:ListFunctions', 's3:ListAllMyBuckets'],
        resources: ['*'],
      })
    );

    this.costAlerterFunction.addToRolePolicy(
      new iam.PolicyStatement({
        sid: 'StopResources',
        actions: ['ec2:StopInstances', 'rds:StopDBInstance'],
        resources: [
          stack.formatArn({ service: 'ec2', resource: 'instance', resourceName: '*' }),
          stack.formatArn({ service: 'rds', resource: 'db', resourceName: '*', arnFormat: cdk.ArnFormat.COLON_RESOURCE_NAME }),
        ],
      })
    );

    this.costAlerterFunction.addToRolePolicy(
      new iam.PolicyStatement({
        sid: 'TerminateTaggedEc2',
        actions: ['ec2:TerminateInstances', 'ec2:DeleteNatGateway'],
        resources: [
          stack.formatArn({ service: 'ec2', resource: 'instance', resourceName: '*' }),
          stack.formatArn({ service: 'ec2', resource: 'natgateway', resourceName: '*' }),
        ],
        conditions: {
          StringEqualsIgnoreCase: { [`aws:ResourceTag/${NUKE_TAG_KEY}`]: 'true' },
        },
      })
    );

    this.costAlerterFunction.addToRolePolicy(
      new iam.PolicyStatement({
        sid: 'DeleteTaggedRds',
        actions: ['rds:DeleteDBInstance'],
        resources: [
          stack.formatArn({ service: 'rds', resource: 'db', resourceName: '*', arnFormat: cdk.ArnFormat.COLON_RESOURCE_NAME }),
        ],
        conditions: {
          StringEqualsIgnoreCase: { [`rds:db-tag/${NUKE_TAG_KEY}`]: 'true' },
        },
      })
    );

    // DeleteDBInstance keeps a final snapshot
    this.costAlerterFunction.addToRolePolicy(
      new iam.PolicyStatement({
        sid: 'CreateFinalSnapshot',
        actions: ['rds:CreateDBSnapshot'],
        resources: [
          stack.formatArn({ service: 'rds', resource: 'db', resourceName: '*', arnFormat: cdk.ArnFormat.COLON_RESOURCE_NAME }),
          stack.formatArn({ service: 'rds', resource: 'snapshot', resourceName: '*', arnFormat: cdk.ArnFormat.COLON_RESOURCE_NAME }),
        ],
      })
    );

    this.scheduleRule = new events.Rule(this, 'DailyCostCheckRule', {
      description: 'Runs the cost check once a day',
      schedule: props.schedule ?? events.Schedule.cron({ minute: '0', hour: '9' }),
    });
    this.scheduleRule.addTarget(new targets.LambdaFunction(this.costAlerterFunction));

    this.budgetTopic = new sns.Topic(this, 'BudgetAlertTopic', {
      displayName: 'AWS Budget cost alerts',
    });
    this.budgetTopic.addSubscription(new subscriptions.LambdaSubscription(this.costAlerterFunction));
    this.budgetTopic.addToResourcePolicy(
      new iam.PolicyStatement({
        actions: ['SNS:Publish'],
        principals: [new iam.ServicePrincipal('budgets.amazonaws.com')],
        resources: [this.budgetTopic.topicArn],
        conditions: {
          StringEquals: { 'aws:SourceAccount': stack.account },
        },
      })
    );

    const snsSubscriber = { subscriptionType: 'SNS', address: this.budgetTopic.topicArn };

    /**
     * Monthly cost budget, limited at the critical threshold. The first
     * notification fires at the alert threshold as an absolute value, the
     * second when actual spend reaches the limit.
     */
    this.budget = new budgets.CfnBudget(this, 'MonthlyCostBudget', {
      budget: {
        budgetType: 'COST',
        timeUnit: 'MONTHLY',
        budgetLimit: {
          amount: props.criticalThreshold,
          unit: 'USD',
        },
      },
      notificationsWithSubscribers: [
        {
          notification: {
            notificationType: 'ACTUAL',
            comparisonOperator: 'GREATER_THAN',
            threshold: props.alertThreshold,
            thresholdType: 'ABSOLUTE_VALUE',
          },
          subscribers: [snsSubscriber],
        },
        {
          notification: {
            notificationType: 'ACTUAL',
            comparisonOperator: 'GREATER_THAN',
            threshold: 100,
            thresholdType: 'PERCENTAGE',
          },
          subscribers: [snsSubscriber],
        },
      ],
    });
  }
}
