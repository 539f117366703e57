/**
 * JsonFile Tests
 */

import * as fs from 'fs';
import * as path from 'path';
import { z } from 'zod';
import { JsonFile } from '../../../src/persistence/json-file';
import { PersistenceError } from '../../../src/utils/errors';
import { useTempDir } from '../../helpers/temp-dir';

const documentSchema = z.object({
  name: z.string(),
  tags: z.array(z.string()),
});

describe('JsonFile', () => {
  const tempDir = useTempDir();

  it('should return null for a missing file', () => {
    const file = new JsonFile(path.join(tempDir(), 'missing.json'), documentSchema);

    expect(file.exists()).toBe(false);
    expect(file.read()).toBeNull();
  });

  it('should create parent directories on write', () => {
    const target = path.join(tempDir(), 'a', 'b', 'doc.json');
    const file = new JsonFile(target, documentSchema);

    file.write({ name: 'persona', tags: ['x'] });

    expect(fs.readFileSync(target, 'utf-8')).toBe('{\n  "name": "persona",\n  "tags": [\n    "x"\n  ]\n}');
    expect(file.read()).toEqual({ name: 'persona', tags: ['x'] });
  });

  it('should sort keys recursively when asked', () => {
    const target = path.join(tempDir(), 'sorted.json');
    const file = new JsonFile(target, z.record(z.unknown()));

    file.write({ zeta: { b: 1, a: 2 }, alpha: [{ d: 1, c: 2 }] }, { sortKeys: true });

    expect(fs.readFileSync(target, 'utf-8').replace(/\s/g, '')).toBe(
      '{"alpha":[{"c":2,"d":1}],"zeta":{"a":2,"b":1}}'
    );
  });

  it('should throw PersistenceError for invalid JSON', () => {
    const target = path.join(tempDir(), 'broken.json');
    fs.writeFileSync(target, '{');

    expect(() => new JsonFile(target, documentSchema).read()).toThrow(PersistenceError);
  });

  it('should throw PersistenceError when validation fails', () => {
    const target = path.join(tempDir(), 'invalid.json');
    fs.writeFileSync(target, JSON.stringify({ name: 42 }));

    expect(() => new JsonFile(target, documentSchema).read()).toThrow(/Invalid document/);
  });

  it('should throw PersistenceError when the write fails', () => {
    const blocker = path.join(tempDir(), 'blocker');
    fs.writeFileSync(blocker, '');
    const file = new JsonFile(path.join(blocker, 'doc.json'), documentSchema);

    expect(() => file.write({ name: 'n', tags: [] })).toThrow(PersistenceError);
  });
});
