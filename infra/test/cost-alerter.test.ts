import { Template, Match } from 'aws-cdk-lib/assertions';
import { createTestStack } from './helpers';

/**
 * Test to verify the CostAlerter function runtime and sizing.
 */
test('CostAlerter Lambda runs on Node.js 20 ARM64 with a 5 minute timeout', () => {
  // GIVEN
  const { stack } = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::Lambda::Function', {
    Description: 'Checks month-to-date AWS spend, sends ntfy alerts and optionally stops expensive resources',
    Runtime: 'nodejs20.x',
    Architectures: ['arm64'],
    Handler: 'index.handler',
    MemorySize: 256,
    Timeout: 300,
  });
  expect(stack.costAlerterFunction).toBeDefined();
});

/**
 * Test to verify the safe defaults: auto-nuke off, dry run on.
 */
test('CostAlerter Lambda has default thresholds and nuke settings', () => {
  // GIVEN
  const { stack } = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::Lambda::Function', {
    Environment: {
      Variables: {
        ALERT_THRESHOLD: '10',
        CRITICAL_THRESHOLD: '50',
        NTFY_TOPIC: 'aws-cost-alerts',
        NTFY_SERVER: 'https://ntfy.sh',
        ENABLE_AUTO_NUKE: 'false',
        NUKE_DRY_RUN: 'true',
        SEND_DAILY_SUMMARY: 'false',
      },
    },
  });
});

test('CostAlerter Lambda uses thresholds and flags from stack props', () => {
  // GIVEN
  const { stack } = createTestStack({
    alertThreshold: 25,
    criticalThreshold: 100,
    ntfyTopic: 'team-costs',
    ntfyServer: 'https://ntfy.example.com',
    enableAutoNuke: true,
    nukeDryRun: false,
    sendDailySummary: true,
  });

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::Lambda::Function', {
    Environment: {
      Variables: {
        ALERT_THRESHOLD: '25',
        CRITICAL_THRESHOLD: '100',
        NTFY_TOPIC: 'team-costs',
        NTFY_SERVER: 'https://ntfy.example.com',
        ENABLE_AUTO_NUKE: 'true',
        NUKE_DRY_RUN: 'false',
        SEND_DAILY_SUMMARY: 'true',
      },
    },
  });
});

/**
 * Test to verify the daily EventBridge schedule.
 */
test('Daily rule invokes the CostAlerter at 09:00 UTC', () => {
  // GIVEN
  const { stack } = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::Events::Rule', {
    ScheduleExpression: 'cron(0 9 * * ? *)',
    State: 'ENABLED',
    Targets: [
      Match.objectLike({
        Arn: {
          'Fn::GetAtt': [Match.stringLikeRegexp('CostAlerterFunction'), 'Arn'],
        },
      }),
    ],
  });
  template.hasResourceProperties('AWS::Lambda::Permission', {
    Action: 'lambda:InvokeFunction',
    Principal: 'events.amazonaws.com',
  });
});

/**
 * Test to verify budget notifications reach the function through SNS.
 */
test('Budget topic is subscribed by the CostAlerter Lambda', () => {
  // GIVEN
  const { stack } = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.resourceCountIs('AWS::SNS::Topic', 1);
  template.hasResourceProperties('AWS::SNS::Subscription', {
    Protocol: 'lambda',
    Endpoint: {
      'Fn::GetAtt': [Match.stringLikeRegexp('CostAlerterFunction'), 'Arn'],
    },
  });
  template.hasResourceProperties('AWS::Lambda::Permission', {
    Action: 'lambda:InvokeFunction',
    Principal: 'sns.amazonaws.com',
  });
  expect(stack.budgetTopic).toBeDefined();
});

/**
 * Test to verify AWS Budgets may publish to the topic, scoped to this account.
 */
test('Budget topic policy allows budgets.amazonaws.com to publish', () => {
  // GIVEN
  const { stack } = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::SNS::TopicPolicy', {
    PolicyDocument: {
      Statement: Match.arrayWith([
        Match.objectLike({
          Action: 'SNS:Publish',
          Effect: 'Allow',
          Principal: { Service: 'budgets.amazonaws.com' },
          Condition: {
            StringEquals: { 'aws:SourceAccount': { Ref: 'AWS::AccountId' } },
          },
        }),
      ]),
    },
  });
});

/**
 * Test to verify the monthly budget is limited at the critical threshold and
 * notifies at the alert threshold.
 */
test('Monthly cost budget notifies at alert and critical thresholds', () => {
  // GIVEN
  const { stack } = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.resourceCountIs('AWS::Budgets::Budget', 1);
  template.hasResourceProperties('AWS::Budgets::Budget', {
    Budget: {
      BudgetType: 'COST',
      TimeUnit: 'MONTHLY',
      BudgetLimit: { Amount: 50, Unit: 'USD' },
    },
    NotificationsWithSubscribers: [
      Match.objectLike({
        Notification: {
          NotificationType: 'ACTUAL',
          ComparisonOperator: 'GREATER_THAN',
          Threshold: 10,
          ThresholdType: 'ABSOLUTE_VALUE',
        },
        Subscribers: [
          {
            SubscriptionType: 'SNS',
            Address: { Ref: Match.stringLikeRegexp('BudgetAlertTopic') },
          },
        ],
      }),
      Match.objectLike({
        Notification: {
          NotificationType: 'ACTUAL',
          ComparisonOperator: 'GREATER_THAN',
          Threshold: 100,
          ThresholdType: 'PERCENTAGE',
        },
      }),
    ],
  });
});

test('Stack rejects a critical threshold below the alert threshold', () => {
  // GIVEN / WHEN / THEN
  expect(() => createTestStack({ alertThreshold: 60, criticalThreshold: 50 })).toThrow(
    'criticalThreshold (50) must not be lower than alertThreshold (60)'
  );
});

test('Stack accepts equal thresholds', () => {
  // GIVEN
  const { stack } = createTestStack({ alertThreshold: 20, criticalThreshold: 20 });

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasResourceProperties('AWS::Budgets::Budget', {
    Budget: { BudgetLimit: { Amount: 20, Unit: 'USD' } },
  });
});
