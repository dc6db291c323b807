import { Template, Match } from 'aws-cdk-lib/assertions';
import { Tags } from 'aws-cdk-lib/core';
import { createTestStack } from './helpers';

/**
 * Test to verify global FinOps tags are propagated to all resources.
 */
test('Global tags are applied to resources', () => {
  // GIVEN
  const { app, stack } = createTestStack();
  Tags.of(app).add('Project', 'Image-Resizer-Cost-Guard');
  Tags.of(app).add('Owner', 'platform-team');

  // WHEN
  const template = Template.fromStack(stack);

  // THEN - tags are rendered sorted by key
  template.hasResourceProperties('AWS::Lambda::Function', {
    Tags: Match.arrayWith([
      { Key: 'Owner', Value: 'platform-team' },
      { Key: 'Project', Value: 'Image-Resizer-Cost-Guard' },
    ]),
  });
  template.hasResourceProperties('AWS::S3::Bucket', {
    Tags: Match.arrayWith([
      { Key: 'Owner', Value: 'platform-team' },
      { Key: 'Project', Value: 'Image-Resizer-Cost-Guard' },
    ]),
  });
  template.hasResourceProperties('AWS::SNS::Topic', {
    Tags: [
      { Key: 'Owner', Value: 'platform-team' },
      { Key: 'Project', Value: 'Image-Resizer-Cost-Guard' },
    ],
  });
});

/**
 * Test to verify the stack exports what a deployer needs.
 */
test('Stack outputs API URL, bucket names, function names and budget topic', () => {
  // GIVEN
  const { stack } = createTestStack();

  // WHEN
  const template = Template.fromStack(stack);

  // THEN
  template.hasOutput('ApiUrl', {
    Description: 'Base URL of the image resize API',
  });
  template.hasOutput('UploadBucketName', {
    Value: { Ref: Match.stringLikeRegexp('StorageUploadBucket') },
  });
  template.hasOutput('ResizedBucketName', {
    Value: { Ref: Match.stringLikeRegexp('StorageResizedBucket') },
  });
  template.hasOutput('ResizeFunctionName', {
    Value: { Ref: Match.stringLikeRegexp('ResizeImageFunction') },
  });
  template.hasOutput('CostAlerterFunctionName', {
    Value: { Ref: Match.stringLikeRegexp('CostAlerterFunction') },
  });
  template.hasOutput('BudgetTopicArn', {
    Value: { Ref: Match.stringLikeRegexp('BudgetAlertTopic') },
  });
});

test('Stack exposes its main resources as properties', () => {
  // GIVEN / WHEN
  const { stack } = createTestStack();

  // THEN
  expect(stack.uploadBucket).toBeDefined();
  expect(stack.resizedBucket).toBeDefined();
  expect(stack.httpApi).toBeDefined();
  expect(stack.resizeFunction).toBeDefined();
  expect(stack.costAlerterFunction).toBeDefined();
  expect(stack.budgetTopic).toBeDefined();
});
