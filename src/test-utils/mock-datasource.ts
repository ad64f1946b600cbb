import { MockRepo } from './mock-repo';

export type RepoBinding = [entity: unknown, repo: MockRepo<unknown>];

export type MockDataSource = {
  transaction: jest.Mock;
  getRepository: jest.Mock;
};

/**
 * `transaction` runs its callback (always the last argument, after an
 * optional isolation level) against a manager that hands out the given
 * mock repositories.
 */
export function createMockDataSource(
  bindings: RepoBinding[] = [],
): MockDataSource {
  const repos = new Map<unknown, MockRepo<unknown>>(bindings);

  const getRepository = jest.fn().mockImplementation((entity: unknown) => {
    const repo = repos.get(entity);
    if (!repo) throw new Error('Unsupported repository in test');
    return repo;
  });

  const manager = { getRepository };

  const transaction = jest
    .fn()
    .mockImplementation(async (...args: unknown[]) => {
      const work = args[args.length - 1];
      if (typeof work !== 'function') {
        throw new Error('transaction called without a callback');
      }
      return work(manager);
    });

  return { transaction, getRepository };
}
