/**
 * Shared Drizzle ORM mock for unit tests.
 *
 * Creates a flat chain mock where every query-builder method returns `this`.
 * Control results by overriding terminal methods:
 *
 *   mockDb.limit.mockResolvedValue([row]);           // single query
 *   mockDb.returning.mockResolvedValueOnce([row1])   // sequential queries
 *                   .mockResolvedValueOnce([row2]);
 *
 * A method that is terminal in one query but chained in another (`where`
 * followed by `orderBy`, say) should be given `mockReturnValueOnce(mockDb)`
 * for the chained call before the resolved value.
 */
export function createDrizzleMock() {
  const mock: Record<string, jest.Mock> = {};

  const chainMethods = [
    // Core query builder
    'select',
    'from',
    'where',
    'orderBy',
    'limit',
    'offset',
    // Joins
    'leftJoin',
    'innerJoin',
    // Insert chain
    'insert',
    'values',
    'returning',
    'onConflictDoNothing',
    'onConflictDoUpdate',
    // Update chain
    'update',
    'set',
    // Delete
    'delete',
    // Advanced
    'groupBy',
    'execute',
  ];

  for (const m of chainMethods) {
    mock[m] = jest.fn().mockReturnThis();
  }

  // Transaction support: executes the callback with the mock as the tx arg
  mock.transaction = jest
    .fn()
    .mockImplementation(async (cb: (tx: typeof mock) => Promise<unknown>) =>
      cb(mock),
    );

  return mock;
}

export type MockDb = ReturnType<typeof createDrizzleMock>;
