import { describe, it, expect } from 'vitest';
import { measureGeneration } from './measure.js';
import { computeSampleMetrics } from './sample.js';
import { FakeClock } from '../../testing/fake-clock.js';
import { FakeInferenceGateway, evenChunks } from '../../testing/fake-inference-gateway.js';

function setup(generation: ConstructorParameters<typeof FakeInferenceGateway>[0]['generation']) {
  const clock = new FakeClock();
  const gateway = new FakeInferenceGateway({ installed: ['llama3:latest'], clock, generation });
  return { clock, gateway };
}

describe('measureGeneration', () => {
  it('records first-token and completion timestamps from the stream', async () => {
    const { clock, gateway } = setup(() => ({ chunks: evenChunks(10, 100) }));

    const sample = await measureGeneration(gateway, clock, { model: 'llama3', prompt: 'hi', run: 1 });

    expect(sample.startedAt).toBe(0);
    expect(sample.firstTokenAt).toBe(100);
    expect(sample.endedAt).toBe(1000);
    expect(sample.chunkCount).toBe(10);
    expect(sample.tokenCount).toBe(10);
    expect(sample.server).toBeNull();
  });

  it('computes throughput as N tokens over the simulated duration T', async () => {
    const { clock, gateway } = setup(() => ({ chunks: evenChunks(48, 25), finishDelayMs: 400 }));

    const sample = await measureGeneration(gateway, clock, { model: 'llama3', prompt: 'hi', run: 1 });
    const metrics = computeSampleMetrics(sample);

    expect(metrics.totalMs).toBe(1600);
    expect(metrics.tokensPerSecond).toBeCloseTo(48 / 1.6, 10);
    expect(metrics.ttftMs).toBe(25);
  });

  it('prefers the server eval_count over the chunk count', async () => {
    const { clock, gateway } = setup(() => ({
      chunks: evenChunks(5, 200),
      timings: { evalCount: 120, evalDurationNs: 3e9 },
    }));

    const sample = await measureGeneration(gateway, clock, { model: 'llama3', prompt: 'hi', run: 2 });
    const metrics = computeSampleMetrics(sample);

    expect(sample.run).toBe(2);
    expect(sample.chunkCount).toBe(5);
    expect(sample.tokenCount).toBe(120);
    expect(metrics.tokensPerSecond).toBeCloseTo(120, 10);
    expect(metrics.serverTokensPerSecond).toBeCloseTo(40, 10);
  });

  it('leaves first-token time unset when no chunk carries text', async () => {
    const { clock, gateway } = setup(() => ({ chunks: [{ text: '', delayMs: 50 }] }));

    const sample = await measureGeneration(gateway, clock, { model: 'llama3', prompt: 'hi', run: 1 });
    const metrics = computeSampleMetrics(sample);

    expect(sample.firstTokenAt).toBeNull();
    expect(sample.tokenCount).toBe(0);
    expect(metrics.ttftMs).toBeNull();
    expect(metrics.tokensPerSecond).toBe(0);
  });
});
