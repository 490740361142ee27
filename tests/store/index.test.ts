import { describe, it, expect } from 'vitest';
import { createRepository, GitVersionedRepository, JsonFileRepository } from '../../src/store/index.js';

describe('createRepository', () => {
  it('should use the plain data file by default', () => {
    const repo = createRepository({ dataPath: '/tmp/phonebook/entries.json', git: false, defaultCountry: 'US' });

    expect(repo).toBeInstanceOf(JsonFileRepository);
  });

  it('should version the data file when git is enabled', () => {
    const repo = createRepository({ dataPath: '/tmp/phonebook/entries.json', git: true, defaultCountry: 'US' });

    expect(repo).toBeInstanceOf(GitVersionedRepository);
  });
});
