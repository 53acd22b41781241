import { Cachable } from '../cachable';

describe('Cachable', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should stamp creation and update time from the clock', () => {
    jest.spyOn(Date, 'now').mockReturnValue(1_000);

    const entry = new Cachable({ text: 'a' }, '1');

    expect(entry.createdAt).toBe(1_000);
    expect(entry.updatedAt).toBe(1_000);
  });

  it('should accept an explicit last update time', () => {
    jest.spyOn(Date, 'now').mockReturnValue(1_000);

    const entry = new Cachable({ text: 'a' }, '1', 500);

    expect(entry.createdAt).toBe(1_000);
    expect(entry.updatedAt).toBe(500);
  });

  it('should track stream keys in insertion order without duplicates', () => {
    const entry = new Cachable('value', '1');

    entry.addStreamKeyIfNotExists('1');
    entry.addStreamKeyIfNotExists('todos');
    entry.addStreamKeyIfNotExists('1');
    entry.addStreamKeyIfNotExists('done');

    expect(entry.streamKeys).toEqual(['1', 'todos', 'done']);
  });

  it('should remove stream keys', () => {
    const entry = new Cachable('value', '1');
    entry.addStreamKeyIfNotExists('1');
    entry.addStreamKeyIfNotExists('todos');

    entry.removeStreamKey('todos');
    entry.removeStreamKey('missing');

    expect(entry.streamKeys).toEqual(['1']);
  });

  it('should replace the model and refresh the update time', () => {
    let now = 1_000;
    jest.spyOn(Date, 'now').mockImplementation(() => now);
    const entry = new Cachable('old', '1');

    now = 2_000;
    entry.update('new');

    expect(entry.model).toBe('new');
    expect(entry.createdAt).toBe(1_000);
    expect(entry.updatedAt).toBe(2_000);
  });
});
