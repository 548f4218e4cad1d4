// eslint-disable-next-line @typescript-eslint/no-unused-vars
export type MockRepo<T> = {
  findOne: jest.Mock;
  find: jest.Mock;
  count: jest.Mock;
  create: jest.Mock;
  save: jest.Mock;
  update: jest.Mock;
  remove: jest.Mock;
  delete: jest.Mock;
};

export function createMockRepo<T>(): MockRepo<T> {
  return {
    findOne: jest.fn(),
    find: jest.fn(),
    count: jest.fn(),
    create: jest.fn((input: unknown) => input),
    save: jest.fn(async (input: unknown) => input),
    update: jest.fn(),
    remove: jest.fn(),
    delete: jest.fn(),
  };
}
