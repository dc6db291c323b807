import { Context, SNSEvent, ScheduledEvent } from 'aws-lambda';
import { CostExplorerClient } from '@aws-sdk/client-cost-explorer';
import { EC2Client } from '@aws-sdk/client-ec2';
import { LambdaClient } from '@aws-sdk/client-lambda';
import { RDSClient } from '@aws-sdk/client-rds';
import { S3Client } from '@aws-sdk/client-s3';
import { CostCheckResult } from './interfaces';
import { createNtfyNotifier, loadCostAlerterSettings, parseTrigger, runCostCheck } from './lib';

/**
 * AWS SDK Clients
 *
 * Created once per execution environment. Cost Explorer only has an endpoint
 * in us-east-1, whatever region the function runs in; the others act on the
 * function's own region.
 */
const costExplorerClient = new CostExplorerClient({ region: 'us-east-1' });
const ec2Client = new EC2Client({});
const rdsClient = new RDSClient({});
const lambdaClient = new LambdaClient({});
const s3Client = new S3Client({});

export type CostAlerterEvent = ScheduledEvent | SNSEvent | Record<string, unknown>;

/**
 * CostAlerter Lambda Function Handler
 *
 * Invoked daily by an EventBridge schedule and whenever the AWS Budget
 * publishes to its SNS topic. Settings are read from the environment once per
 * invocation and passed down; the job itself never touches process.env.
 *
 * Environment Variables:
 * - ALERT_THRESHOLD: USD amount that triggers an alert (default 10)
 * - CRITICAL_THRESHOLD: USD amount that triggers the critical path (default 50)
 * - NTFY_TOPIC / NTFY_SERVER / NTFY_TOKEN: push notification target
 * - ENABLE_AUTO_NUKE: run the nuke pass at the critical level (default false)
 * - NUKE_DRY_RUN: report instead of acting (default true)
 * - SEND_DAILY_SUMMARY: notify even below the alert threshold (default false)
 *
 * A Cost Explorer failure is rethrown so the invocation is marked failed and
 * nothing is sent on missing data.
 *
 * @param event - Scheduled event, SNS event from AWS Budgets, or a manual payload
 * @param context - Lambda execution context with runtime information
 */
export const handler = async (event: CostAlerterEvent, context: Context): Promise<CostCheckResult> => {
  console.log('Event received', JSON.stringify(event, null, 2));
  console.log('Lambda Context', JSON.stringify({ requestId: context.awsRequestId, functionName: context.functionName }));

  const settings = loadCostAlerterSettings();
  const trigger = parseTrigger(event);

  try {
    const result = await runCostCheck(trigger, settings, {
      costExplorer: costExplorerClient,
      ec2: ec2Client,
      rds: rdsClient,
      lambda: lambdaClient,
      s3: s3Client,
      notify: createNtfyNotifier(settings.ntfy),
    });
    console.log('Cost check result', JSON.stringify(result));
    return result;
  } catch (error) {
    console.error('Cost check failed:', error);
    throw error;
  }
};
