#!/usr/bin/env node
import * as cdk from 'aws-cdk-lib/core';
import { Tags } from 'aws-cdk-lib/core';
import { InfraStack } from '../lib/infra-stack';

const app = new cdk.App();

function numberContext(key: string): number | undefined {
  const value: unknown = app.node.tryGetContext(key);
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  const parsed = Number(value);
  if (Number.isNaN(parsed)) {
    throw new Error(`Context value "${key}" must be a number, got ${String(value)}`);
  }
  return parsed;
}

function booleanContext(key: string): boolean | undefined {
  const value: unknown = app.node.tryGetContext(key);
  if (value === undefined || value === null || value === '') {
    return undefined;
  }
  // -c flags arrive as strings
  return value === true || String(value).toLowerCase() === 'true';
}

function stringContext(key: string): string | undefined {
  const value: unknown = app.node.tryGetContext(key);
  return typeof value === 'string' && value !== '' ? value : undefined;
}

new InfraStack(app, 'ImageResizerCostGuardStack', {
  env: {
    account: process.env.CDK_DEFAULT_ACCOUNT,
    region: process.env.CDK_DEFAULT_REGION,
  },
  alertThreshold: numberContext('alertThreshold'),
  criticalThreshold: numberContext('criticalThreshold'),
  ntfyTopic: stringContext('ntfyTopic'),
  ntfyServer: stringContext('ntfyServer'),
  enableAutoNuke: booleanContext('enableAutoNuke'),
  nukeDryRun: booleanContext('nukeDryRun'),
  sendDailySummary: booleanContext('sendDailySummary'),
  resizedWidth: numberContext('resizedWidth'),
  resizedHeight: numberContext('resizedHeight'),
});

/**
 * Global FinOps tags, applied to every taggable resource in the app.
 */
Tags.of(app).add('Project', 'Image-Resizer-Cost-Guard');
Tags.of(app).add('Owner', 'platform-team');
