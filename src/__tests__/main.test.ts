import { main } from '../main';
import { createArticle, createMockResponse, InMemoryNewsStore, TEST_ENV } from './setup';

describe('main', () => {
  it('exits 1 on missing credentials before any network activity', async () => {
    const fetchMock = jest.spyOn(global, 'fetch');
    const createStore = jest.fn(() => new InMemoryNewsStore());

    await expect(main({ env: { SUPABASE_URL: 'http://localhost:54321' }, createStore })).resolves.toBe(1);
    expect(createStore).not.toHaveBeenCalled();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('exits 1 on an invalid run mode', async () => {
    const createStore = jest.fn(() => new InMemoryNewsStore());

    await expect(main({ env: { ...TEST_ENV, RUN_MODE: 'hourly' }, createStore })).resolves.toBe(1);
    expect(createStore).not.toHaveBeenCalled();
  });

  it('runs a single cycle in once mode and exits 0', async () => {
    const store = new InMemoryNewsStore();
    const fetchMock = jest.spyOn(global, 'fetch')
      .mockImplementation(async () => createMockResponse([createArticle(1), createArticle(2)]));

    const code = await main({ env: { ...TEST_ENV, RUN_MODE: 'once' }, createStore: () => store });

    expect(code).toBe(0);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(store.rows.size).toBe(2);
  });

  it('exits 1 in once mode when the insert fails', async () => {
    const store = new InMemoryNewsStore();
    store.failOn('insertRecords');
    jest.spyOn(global, 'fetch').mockImplementation(async () => createMockResponse([createArticle(1)]));

    await expect(main({ env: { ...TEST_ENV, RUN_MODE: 'once' }, createStore: () => store })).resolves.toBe(1);
  });

  it.each(['SIGINT', 'SIGTERM'] as const)('finishes the current cycle and exits 0 on %s', async signal => {
    const store = new InMemoryNewsStore();
    const fetchMock = jest.spyOn(global, 'fetch').mockImplementation(async () => {
      process.emit(signal);
      return createMockResponse([createArticle(1)]);
    });

    const code = await main({ env: { ...TEST_ENV, RUN_MODE: 'continuous' }, createStore: () => store });

    expect(code).toBe(0);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(store.rows.size).toBe(1);
  });

  it('removes its signal handlers when done', async () => {
    const before = process.listenerCount('SIGINT');
    jest.spyOn(global, 'fetch').mockImplementation(async () => createMockResponse([]));

    await main({ env: { ...TEST_ENV, RUN_MODE: 'once' }, createStore: () => new InMemoryNewsStore() });

    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
