import * as cdk from 'aws-cdk-lib/core';
import { InfraStack, InfraStackProps } from '../lib/infra-stack';

/**
 * Create the stack with asset bundling turned off, so synthesis never runs
 * esbuild or installs sharp.
 * @returns The app as well, for tests that add app-level tags
 */
export const createTestStack = (props: InfraStackProps = {}): { app: cdk.App; stack: InfraStack } => {
  const app = new cdk.App({
    context: {
      'aws:cdk:bundling-stacks': [],
    },
  });
  const stack = new InfraStack(app, 'TestStack', props);
  return { app, stack };
};
