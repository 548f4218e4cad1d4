export type MockManager = {
  getRepository: jest.Mock;
};

export type MockDataSource = {
  manager: MockManager;
  transaction: jest.Mock;
};

/**
 * DataSource whose `transaction(cb)` runs `cb` against a manager that hands
 * out the given repositories, keyed by entity class.
 */
export function createMockDataSource(
  entries: Array<[unknown, unknown]> = [],
): MockDataSource {
  const repos = new Map(entries);
  const manager: MockManager = {
    getRepository: jest.fn((entity: unknown) => {
      const repo = repos.get(entity);
      if (!repo) throw new Error('No mock repository registered for entity');
      return repo;
    }),
  };

  return {
    manager,
    transaction: jest.fn(async (cb: (m: MockManager) => Promise<unknown>) =>
      cb(manager),
    ),
  };
}
