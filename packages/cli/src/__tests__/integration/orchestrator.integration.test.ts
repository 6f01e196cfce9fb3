/**
 * Integration tests for the orchestrator
 * Runs the full pipeline against an in-process stand-in for the services
 */

import { StageResponseError, StageUnavailableError } from '@annotext/core';
import {
  createMockFactCheckStage,
  createMockFetch,
  createMockStage,
  type MockReply,
  type RecordedRequest,
} from '@annotext/test-utils';
import { describe, it, expect, vi } from 'vitest';

import { DEFAULT_CONFIG } from '../../config/defaults.js';
import type { AnnotextConfig } from '../../config/schema.js';
import { validateConfig } from '../../config/validation.js';
import { orchestrateRun } from '../../orchestrator/orchestrator.js';
import { buildStages, performHealthChecks } from '../../orchestrator/services.js';

const TEXT = 'The museum reopened last spring. Visitors praised the new wing.';

const SEEDS = [{ claim: 'The museum reopened last spring', fact: 'The museum reopened in April.' }];

type ServiceReplies = Partial<Record<'9001' | '9002' | '9003', MockReply>>;

const HEALTHY_REPLIES: Required<ServiceReplies> = {
  '9001': { body: { selections: [{ sentences: [{ pos: 0.7, neu: 0.2, neg: 0.1 }] }] } },
  '9002': { body: { hate: [0.1], non_hate: [0.9] } },
  '9003': { body: { consistency: [0.8] } },
};

function portOf(request: RecordedRequest): string {
  return new URL(request.url).port;
}

/**
 * One route for every service, dispatched on the port of the default endpoints
 */
function createServices(overrides: ServiceReplies = {}) {
  const replies: Record<string, MockReply> = { ...HEALTHY_REPLIES, ...overrides };
  return createMockFetch({
    routes: {
      'POST /v1/process': (request) =>
        replies[portOf(request)] ?? { status: 404, statusText: 'Not Found' },
      'GET /v1/typesystem': (request) =>
        portOf(request) === '9002' ? { status: 503 } : { body: { types: [] } },
    },
  });
}

function freshConfig(): AnnotextConfig {
  return validateConfig(DEFAULT_CONFIG);
}

describe('Orchestrator Integration', () => {
  describe('full pipeline', () => {
    it('should run every stage in order and aggregate the results', async () => {
      const { fetch, requests } = createServices();

      const report = await orchestrateRun({ text: TEXT, seeds: SEEDS }, freshConfig(), { fetch });

      expect(report.run.status).toBe('completed');
      expect(report.run.stages.map((s) => [s.name, s.status, s.annotationsAdded])).toEqual([
        ['sentiment', 'completed', 1],
        ['hate_check', 'completed', 1],
        ['fact_check', 'completed', 1],
      ]);
      expect(requests.map(portOf)).toEqual(['9001', '9002', '9003']);

      expect(report.seeded).toBe(1);
      expect(report.summary.counts).toEqual({
        sentiment: 1,
        hate_verdict: 1,
        claim: 1,
        fact: 1,
        fact_check_verdict: 1,
      });
      expect(report.summary.sentiments).toEqual([
        { span: { begin: 0, end: TEXT.length }, label: 'positive', score: 0.7, source: 'sentiment' },
      ]);
      expect(report.summary.hateVerdicts[0]?.flagged).toBe(false);
      expect(report.summary.factChecks).toMatchObject([
        {
          claim: 'The museum reopened last spring',
          fact: 'The museum reopened in April.',
          consistency: 0.8,
          assessment: 'supported',
          claimSpan: { begin: 0, end: 32 },
        },
      ]);
    });

    it('should send the seeded pairs as a check sheet', async () => {
      const { fetch, requests } = createServices();

      await orchestrateRun({ text: TEXT, seeds: SEEDS }, freshConfig(), { fetch });

      const factRequest = requests.find((request) => portOf(request) === '9003');
      expect(factRequest?.body).toMatchObject({
        text: 'Claim 1: The museum reopened last spring Fact 1: The museum reopened in April.\n',
        lang: 'en',
      });
    });

    it('should use the configured language and parameters', async () => {
      const { fetch, requests } = createServices();
      const config = freshConfig();
      config.pipeline.language = 'de';
      config.stages.sentiment.parameters = { device: 'cpu' };

      await orchestrateRun({ text: TEXT }, config, { fetch });

      expect(requests[0]?.body).toMatchObject({
        lang: 'de',
        device: 'cpu',
        model_name: 'cardiffnlp/twitter-xlm-roberta-base-sentiment',
      });
    });

    it('should report events to the observer', async () => {
      const { fetch } = createServices();
      const observer = { onStageStart: vi.fn(), onRunComplete: vi.fn() };

      await orchestrateRun({ text: TEXT }, freshConfig(), { fetch, observer });

      expect(observer.onStageStart).toHaveBeenCalledTimes(3);
      expect(observer.onRunComplete).toHaveBeenCalledTimes(1);
    });

    it('should run injected stages instead of building clients', async () => {
      const { fetch, requests } = createServices();
      const stages = [createMockStage({ name: 'hate_check' }), createMockFactCheckStage(0.4)];

      const report = await orchestrateRun({ text: TEXT, seeds: SEEDS }, freshConfig(), {
        fetch,
        stages,
      });

      expect(requests).toEqual([]);
      expect(report.run.stages.map((s) => s.name)).toEqual(['hate_check', 'fact_check']);
      expect(report.summary.factChecks[0]?.assessment).toBe('weakly_supported');
    });
  });

  describe('failures', () => {
    it('should fail the run and keep earlier results when a stage fails', async () => {
      const { fetch } = createServices({
        '9003': { error: new TypeError('fetch failed: connect ECONNREFUSED localhost:9003') },
      });

      const report = await orchestrateRun({ text: TEXT, seeds: SEEDS }, freshConfig(), { fetch });

      expect(report.run.status).toBe('failed');
      expect(report.run.stages.map((s) => s.status)).toEqual(['completed', 'completed', 'failed']);
      expect(report.run.error).toBeInstanceOf(StageUnavailableError);
      expect(report.summary.status).toBe('failed');
      expect(report.summary.counts.sentiment).toBe(1);
      expect(report.summary.counts.hate_verdict).toBe(1);
      expect(report.summary.counts.fact_check_verdict).toBe(0);
    });

    it('should skip a failing stage marked continueOnError', async () => {
      const { fetch } = createServices({ '9002': { status: 500, statusText: 'Internal Server Error' } });
      const config = freshConfig();
      config.stages.hateCheck.continueOnError = true;

      const report = await orchestrateRun({ text: TEXT, seeds: SEEDS }, config, { fetch });

      expect(report.run.status).toBe('completed');
      expect(report.run.stages.map((s) => s.status)).toEqual(['completed', 'skipped', 'completed']);
      expect(report.run.stages[1]?.error).toBeInstanceOf(StageResponseError);
      expect(report.summary.counts.hate_verdict).toBe(0);
      expect(report.summary.counts.fact_check_verdict).toBe(1);
    });

    it('should fail the run when the deadline passes', async () => {
      const { fetch } = createServices({
        '9001': { ...HEALTHY_REPLIES['9001'], latencyMs: 1000 },
      });
      const config = freshConfig();
      config.pipeline.deadlineMs = 20;

      const report = await orchestrateRun({ text: TEXT }, config, { fetch });

      expect(report.run.status).toBe('failed');
      expect(report.run.stages.map((s) => s.status)).toEqual(['failed', 'not_run', 'not_run']);
      expect(report.summary.total).toBe(0);
    });
  });

  describe('seeds', () => {
    it('should skip a seed whose anchor is not in the text and send no fact check', async () => {
      const { fetch, requests } = createServices();
      const onSeedSkipped = vi.fn();

      const report = await orchestrateRun(
        { text: TEXT, seeds: [{ claim: 'The gallery closed', fact: 'It did not.' }] },
        freshConfig(),
        { fetch, onSeedSkipped },
      );

      expect(onSeedSkipped).toHaveBeenCalledWith({
        entry: 1,
        claim: 'The gallery closed',
        reason: 'anchor "The gallery closed" not found',
      });
      expect(report.seeded).toBe(0);
      expect(report.skippedSeeds).toHaveLength(1);
      expect(requests.map(portOf)).toEqual(['9001', '9002']);
      expect(report.run.stages[2]).toMatchObject({ status: 'completed', annotationsAdded: 0 });
    });

    it('should check every fact of a claim seeded by two entries', async () => {
      const { fetch } = createServices({ '9003': { body: { consistency: [0.8, 0.3] } } });
      const seeds = [...SEEDS, { claim: 'The museum reopened last spring', fact: 'It reopened in May.' }];

      const report = await orchestrateRun({ text: TEXT, seeds }, freshConfig(), { fetch });

      expect(report.seeded).toBe(1);
      expect(report.summary.counts.claim).toBe(1);
      expect(report.summary.counts.fact).toBe(2);
      expect(report.summary.counts.fact_check_verdict).toBe(2);
    });
  });

  describe('stage construction', () => {
    it('should build enabled stages in configured order', () => {
      const config = freshConfig();
      config.stages.hateCheck.enabled = false;
      config.pipeline.order = ['factCheck', 'hateCheck', 'sentiment'];

      const stages = buildStages(config);

      expect(stages.map((s) => s.key)).toEqual(['factCheck', 'sentiment']);
      expect(stages.map((s) => s.client.name)).toEqual(['fact_check', 'sentiment']);
    });

    it('should pass endpoint, scale and continueOnError to the clients', () => {
      const config = freshConfig();
      config.stages.sentiment.endpoint = 'http://sentiment.internal:8080/';
      config.stages.sentiment.scale = 4;
      config.stages.sentiment.continueOnError = true;

      const [sentiment] = buildStages(config);

      expect(sentiment?.client.endpoint).toBe('http://sentiment.internal:8080');
      expect(sentiment?.client.scale).toBe(4);
      expect(sentiment?.client.continueOnError).toBe(true);
    });
  });

  describe('health checks', () => {
    it('should report the health of every stage', async () => {
      const { fetch } = createServices();
      const config = freshConfig();

      const statuses = await performHealthChecks(buildStages(config, { fetch }));

      expect(statuses.map((s) => [s.key, s.name, s.healthy, s.error])).toEqual([
        ['sentiment', 'sentiment', true, undefined],
        ['hateCheck', 'hate_check', false, 'HTTP 503'],
        ['factCheck', 'fact_check', true, undefined],
      ]);
      expect(statuses[1]?.endpoint).toBe('http://localhost:9002');
    });
  });
});
