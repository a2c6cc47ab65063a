import { createMockLogger } from '@knox-integ/logger/mock';
import { describe, expect, it, vi } from 'vitest';
import {
  sequence,
  SequentialGroup,
  type StepContext,
  type StepRegistrar,
} from '~/kit/sequence';

function group(...steps: string[]): SequentialGroup {
  const created = new SequentialGroup('flow', createMockLogger());
  for (const step of steps) {
    created.add(step);
  }
  return created;
}

describe('SequentialGroup', () => {
  it('runs steps in order while they pass', async () => {
    const flow = group('publish', 'search');

    await expect(flow.run('publish', () => 'sent')).resolves.toEqual({
      status: 'passed',
      value: 'sent',
    });
    await expect(flow.run('search', async () => 3)).resolves.toEqual({ status: 'passed', value: 3 });
    expect(flow.steps.map((step) => step.status)).toEqual(['passed', 'passed']);
  });

  it('skips every later step once a step fails', async () => {
    const flow = group('publish', 'search', 'verify');
    const ran: string[] = [];
    const failure = new Error('queue rejected entries');

    await expect(
      flow.run('publish', () => {
        throw failure;
      }),
    ).rejects.toBe(failure);

    await expect(flow.run('search', () => ran.push('search'))).resolves.toEqual({
      status: 'skipped',
      note: 'previous step failed (publish)',
    });
    await expect(flow.run('verify', () => ran.push('verify'))).resolves.toEqual({
      status: 'skipped',
      note: 'previous step failed (publish)',
    });

    expect(ran).toEqual([]);
    expect(flow.failedStep).toBe('publish');
    expect(flow.transitions).toEqual([
      { step: 'publish', from: 'pending', to: 'running' },
      { step: 'publish', from: 'running', to: 'failed' },
      { step: 'search', from: 'pending', to: 'skipped' },
      { step: 'verify', from: 'pending', to: 'skipped' },
    ]);
  });

  it('skips a step whose predecessor never ran', async () => {
    const flow = group('publish', 'search');

    await expect(flow.run('search', () => 'ran')).resolves.toEqual({
      status: 'skipped',
      note: 'previous step did not run (publish)',
    });
    expect(flow.status('publish')).toBe('pending');
  });

  it('refuses to run a step twice', async () => {
    const flow = group('publish');
    await flow.run('publish', () => undefined);

    await expect(flow.run('publish', () => undefined)).rejects.toThrow(
      "Step 'publish' has already passed",
    );
  });

  it('rejects duplicate and unknown step names', async () => {
    const flow = group('publish');

    expect(() => flow.add('publish')).toThrow("Step 'publish' is already declared in 'flow'");
    await expect(flow.run('cleanup', () => undefined)).rejects.toThrow(
      "Unknown step 'cleanup' in 'flow'",
    );
  });
});

interface RegisteredTest {
  name: string;
  body: (ctx: StepContext) => Promise<void>;
  timeout?: number;
}

/** Collects registrations instead of handing them to Vitest */
function recordingRegistrar() {
  const suites: string[] = [];
  const tests: RegisteredTest[] = [];
  const registrar: StepRegistrar = {
    describe: (name, body) => {
      suites.push(name);
      body();
    },
    it: (name, body, timeout) => {
      tests.push({ name, body, timeout });
    },
  };
  const test = (name: string): RegisteredTest => {
    const found = tests.find((registered) => registered.name === name);
    if (!found) {
      throw new Error(`No test registered as '${name}'`);
    }
    return found;
  };
  return { registrar, suites, tests, test };
}

/** A test context whose failure handlers the test triggers itself */
function stepContext() {
  const handlers: Array<() => void> = [];
  const ctx = {
    skip: vi.fn<() => void>(),
    onTestFailed: (handler: () => void) => {
      handlers.push(handler);
    },
  };
  const failTest = () => {
    for (const handler of handlers) {
      handler();
    }
  };
  return { ctx, failTest };
}

describe('SequentialGroup.fail', () => {
  it('fails a running step and discards its late result', async () => {
    const flow = group('publish', 'search');
    let finish: () => void = () => undefined;
    const failure = new Error('timed out');

    const running = flow.run('publish', () => new Promise<void>((resolve) => (finish = resolve)));
    flow.fail('publish', failure);
    finish();

    await expect(running).rejects.toBe(failure);
    expect(flow.steps.map((step) => [step.name, step.status, step.note])).toEqual([
      ['publish', 'failed', undefined],
      ['search', 'skipped', 'previous step failed (publish)'],
    ]);
    expect(flow.transitions.map((transition) => transition.to)).toEqual([
      'running',
      'failed',
      'skipped',
    ]);
  });

  it('leaves a settled step alone', async () => {
    const flow = group('publish', 'search');
    await flow.run('publish', () => 'sent');

    flow.fail('publish', new Error('late'));

    expect(flow.status('publish')).toBe('passed');
    expect(flow.status('search')).toBe('pending');
  });
});

describe('sequence', () => {
  it('registers one sequential suite with a test per step', () => {
    const { registrar, suites, tests } = recordingRegistrar();

    sequence(
      'flow',
      (step) => {
        step('publish', () => undefined, 50);
        step('search', () => undefined);
      },
      { logger: createMockLogger(), registrar },
    );

    expect(suites).toEqual(['flow']);
    expect(tests.map((registered) => [registered.name, registered.timeout])).toEqual([
      ['publish', 50],
      ['search', undefined],
    ]);
  });

  it('fails the step and skips the rest when the test fails before the body settles', async () => {
    const { registrar, test } = recordingRegistrar();
    let finishPublish: () => void = () => undefined;
    const search = vi.fn<() => void>();

    const flow = sequence(
      'flow',
      (step) => {
        step('publish', () => new Promise<void>((resolve) => (finishPublish = resolve)), 50);
        step('search', search);
      },
      { logger: createMockLogger(), registrar },
    );

    const publish = stepContext();
    const publishRun = test('publish').body(publish.ctx);
    publish.failTest();

    expect(flow.steps.map((step) => [step.name, step.status, step.note])).toEqual([
      ['publish', 'failed', undefined],
      ['search', 'skipped', 'previous step failed (publish)'],
    ]);

    const next = stepContext();
    await test('search').body(next.ctx);
    expect(next.ctx.skip).toHaveBeenCalledOnce();
    expect(search).not.toHaveBeenCalled();

    finishPublish();
    await expect(publishRun).rejects.toThrow("Step 'publish' failed before its body settled");
    expect(flow.status('publish')).toBe('failed');
    expect(flow.transitions.some((transition) => transition.to === 'passed')).toBe(false);
  });

  it('skips the rest when a step body throws', async () => {
    const { registrar, test } = recordingRegistrar();
    const search = vi.fn<() => void>();

    const flow = sequence(
      'flow',
      (step) => {
        step('publish', () => {
          throw new Error('queue rejected entries');
        });
        step('search', search);
      },
      { logger: createMockLogger(), registrar },
    );

    const publish = stepContext();
    await expect(test('publish').body(publish.ctx)).rejects.toThrow('queue rejected entries');
    publish.failTest();

    const next = stepContext();
    await test('search').body(next.ctx);

    expect(flow.failedStep).toBe('publish');
    expect(flow.status('search')).toBe('skipped');
    expect(next.ctx.skip).toHaveBeenCalledOnce();
    expect(search).not.toHaveBeenCalled();
  });
});

const registered = sequence(
  'registered steps',
  (step) => {
    step('first', () => 'one');
    step('second', async () => 'two');
  },
  { logger: createMockLogger() },
);

describe('sequence with Vitest', () => {
  it('registers and ran each step as a Vitest test in order', () => {
    expect(registered.steps).toEqual([
      { name: 'first', status: 'passed' },
      { name: 'second', status: 'passed' },
    ]);
  });
});
