// eslint-disable-next-line @typescript-eslint/no-unused-vars
export type MockRepo<T> = {
  findOne: jest.Mock;
  find: jest.Mock;
  count: jest.Mock;
  create: jest.Mock;
  save: jest.Mock;
};

/** `create` echoes its input so services can build entities as usual. */
export function createMockRepo<T>(): MockRepo<T> {
  return {
    findOne: jest.fn(),
    find: jest.fn(),
    count: jest.fn(),
    create: jest.fn().mockImplementation((input: unknown) => input),
    save: jest.fn(),
  };
}
