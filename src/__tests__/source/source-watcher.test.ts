import { RenderError, TransientIOError } from '@/errors/driftless.errors';
import { ManifestRenderer } from '@/renderer/manifest-renderer';
import { InMemoryRepositoryClient } from '@/source/in-memory.repository-client';
import { SourceWatcher, type SourceEvent, type SourceWatcherOptions } from '@/source/source-watcher';
import type { Sleep } from '@/utils/sleep';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { demoApplication, demoFiles, demoSpec, REPO, sleepUntilAborted } from '../fixtures';

vi.mock('@/logger', () => ({
  logger: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    verbose: vi.fn(),
    dir: vi.fn(),
  },
}));

/** Fails the first lookups with a transient error, then behaves. */
class FlakyRepository extends InMemoryRepositoryClient {
  constructor(private failuresLeft: number) {
    super();
  }

  override async resolveRevision(repoURL: string, revision: string): Promise<string> {
    if (this.failuresLeft > 0) {
      this.failuresLeft--;
      throw new TransientIOError('connection reset by peer');
    }
    return super.resolveRevision(repoURL, revision);
  }
}

describe('SourceWatcher', () => {
  let repository: InMemoryRepositoryClient;
  let events: SourceEvent[];

  const watcherFor = (client: InMemoryRepositoryClient, options: SourceWatcherOptions = {}) =>
    new SourceWatcher(
      client,
      new ManifestRenderer(client),
      (event) => {
        events.push(event);
      },
      options,
    );

  beforeEach(() => {
    repository = new InMemoryRepositoryClient();
    events = [];
  });

  describe('poll', () => {
    it('should emit a snapshot once per distinct fingerprint', async () => {
      const watcher = watcherFor(repository);
      watcher.track(demoApplication(), { start: false });

      repository.commit(REPO, 'main', demoFiles());
      await watcher.poll('demo');
      await watcher.poll('demo');
      repository.commit(REPO, 'main', demoFiles());
      await watcher.poll('demo');
      const last = repository.commit(REPO, 'main', demoFiles({ replicas: 2 }));
      await watcher.poll('demo');

      expect(events.map((event) => event.type)).toEqual(['snapshot', 'snapshot']);
      expect(events[1]).toMatchObject({ application: 'demo', snapshot: { revision: last } });
    });

    it('should report a render failure once per failing commit', async () => {
      const watcher = watcherFor(repository);
      watcher.track(demoApplication(), { start: false });

      const first = repository.commit(REPO, 'main', { 'apps/demo/x.yaml': 'kind: [oops\n' });
      await watcher.poll('demo');
      await watcher.poll('demo');
      const second = repository.commit(REPO, 'main', { 'apps/demo/x.yaml': 'kind: [still broken\n' });
      await watcher.poll('demo');

      expect(events.map((event) => (event.type === 'render-failed' ? event.revision : event.type))).toEqual([
        first,
        second,
      ]);
    });

    it('should report a missing revision as NotFound once', async () => {
      const watcher = watcherFor(repository);
      repository.commit(REPO, 'main', demoFiles());
      watcher.track(
        demoApplication('demo', demoSpec({ source: { repoURL: REPO, path: 'apps/demo', targetRevision: 'release' } })),
        { start: false },
      );

      await watcher.poll('demo');
      await watcher.poll('demo');

      expect(events).toHaveLength(1);
      const [event] = events;
      expect(event.type).toBe('render-failed');
      if (event.type === 'render-failed') {
        expect(event.revision).toBe('release');
        expect(event.error).toBeInstanceOf(RenderError);
        expect(event.error.message).toBe(`Revision 'release' not found in '${REPO}'`);
      }
    });

    it('should let transient fetch failures propagate', async () => {
      const flaky = new FlakyRepository(1);
      const watcher = watcherFor(flaky);
      watcher.track(demoApplication(), { start: false });

      await expect(watcher.poll('demo')).rejects.toThrow(TransientIOError);
      expect(events).toEqual([]);
    });

    it('should render again when the source definition changes', async () => {
      const watcher = watcherFor(repository);
      repository.commit(REPO, 'main', demoFiles());
      watcher.track(demoApplication(), { start: false });
      await watcher.poll('demo');

      watcher.track(
        demoApplication(
          'demo',
          demoSpec({
            source: {
              repoURL: REPO,
              path: 'apps/demo',
              targetRevision: 'main',
              images: [{ name: 'demo-app', newTag: '2.0.0' }],
            },
          }),
        ),
        { start: false },
      );
      await watcher.poll('demo');

      expect(events).toHaveLength(2);
      const [first, second] = events;
      if (first.type === 'snapshot' && second.type === 'snapshot') {
        expect(second.snapshot.fingerprint).not.toBe(first.snapshot.fingerprint);
        expect(second.snapshot.objects[0].spec).toMatchObject({
          template: { spec: { containers: [{ image: 'demo-app:2.0.0' }] } },
        });
      } else {
        expect.fail('expected two snapshots');
      }
    });
  });

  describe('run', () => {
    it('should back off after fetch failures and return to the poll interval', async () => {
      const flaky = new FlakyRepository(2);
      flaky.commit(REPO, 'main', demoFiles());
      const delays: number[] = [];
      const sleep: Sleep = async (ms, signal) => {
        delays.push(ms);
        if (delays.length >= 3) {
          await sleepUntilAborted(ms, signal);
        }
      };
      const watcher = watcherFor(flaky, {
        pollIntervalMs: 5000,
        backoff: { baseMs: 100, capMs: 1000, jitter: 'none' },
        sleep,
      });

      watcher.track(demoApplication());

      await vi.waitFor(() => expect(delays).toEqual([100, 200, 5000]));
      expect(events.map((event) => event.type)).toEqual(['snapshot']);

      await watcher.untrack('demo');
      expect(watcher.tracked).toEqual([]);
    });
  });

  describe('notify', () => {
    it('should match repositories regardless of a trailing slash or .git suffix', () => {
      const watcher = watcherFor(repository);
      watcher.track(demoApplication(), { start: false });
      watcher.track(
        demoApplication(
          'web',
          demoSpec({ source: { repoURL: 'https://git.example.com/team/web.git', path: '.', targetRevision: 'main' } }),
        ),
        { start: false },
      );

      expect(watcher.notify('https://git.example.com/team/deploy/')).toEqual(['demo']);
      expect(watcher.notify(REPO, 'main')).toEqual(['demo']);
      expect(watcher.notify(REPO, 'feature')).toEqual([]);
    });
  });
});
