import { describe, it, expect } from 'vitest';
import {
  VersionRegistry,
  NotFoundError,
  createRegistry,
} from '../../src/core/registry.js';
import { ValidationError } from '../../src/core/structural-validator.js';
import type { DependencyRecord } from '../../src/types/registry.js';

const toolA: DependencyRecord = { name: 'toolA', version: '1.2.3', integrityHash: 'sha256:abc' };
const toolB: DependencyRecord = { name: 'toolB', version: '9.9.9' };

describe('VersionRegistry', () => {
  describe('get', () => {
    it('returns the record as loaded', () => {
      const registry = createRegistry([toolA, toolB]);
      expect(registry.get('toolA')).toEqual(toolA);
      expect(registry.get('toolB')).toEqual(toolB);
    });

    it('omits integrityHash for records loaded without one', () => {
      const registry = createRegistry([toolB]);
      expect(Object.keys(registry.get('toolB'))).toEqual(['name', 'version']);
    });

    it('treats a null integrityHash as absent', () => {
      const registry = createRegistry([{ name: 'toolB', version: '9.9.9', integrityHash: null }]);
      expect(registry.get('toolB')).toEqual(toolB);
      expect(Object.keys(registry.get('toolB'))).toEqual(['name', 'version']);
      expect(registry.validate().ok).toBe(true);
    });

    it('throws NotFoundError for an unknown name', () => {
      const registry = createRegistry([toolA, toolB]);
      expect(() => registry.get('toolC')).toThrow(NotFoundError);
      expect(() => registry.get('toolC')).toThrow('Dependency "toolC" not found in registry');
    });

    it('carries the requested name on NotFoundError', () => {
      const registry = createRegistry([]);
      try {
        registry.get('missing');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(NotFoundError);
        if (err instanceof NotFoundError) {
          expect(err.dependencyName).toBe('missing');
          expect(err.name).toBe('NotFoundError');
        }
      }
    });

    it('resolves a duplicated name to its first entry', () => {
      const registry = createRegistry([
        { name: 'toolA', version: '1.0.0' },
        { name: 'toolA', version: '2.0.0' },
      ]);
      expect(registry.get('toolA').version).toBe('1.0.0');
    });
  });

  describe('immutability', () => {
    it('freezes records', () => {
      const registry = createRegistry([toolA]);
      expect(Object.isFrozen(registry.get('toolA'))).toBe(true);
    });

    it('is unaffected by later changes to the input', () => {
      const input = [{ name: 'toolA', version: '1.2.3' }];
      const registry = createRegistry(input);

      input[0].version = '6.6.6';
      input.push({ name: 'toolZ', version: '0.0.1' });

      expect(registry.get('toolA').version).toBe('1.2.3');
      expect(registry.has('toolZ')).toBe(false);
      expect(registry.size).toBe(1);
    });
  });

  describe('all', () => {
    it('yields every record in load order', () => {
      const registry = createRegistry([toolA, toolB]);
      expect([...registry.all()]).toEqual([toolA, toolB]);
    });

    it('is restartable', () => {
      const registry = createRegistry([toolA, toolB]);
      const records = registry.all();
      expect([...records]).toEqual([toolA, toolB]);
      expect([...records]).toEqual([toolA, toolB]);
    });

    it('produces records lazily', () => {
      const registry = createRegistry([toolA, toolB]);
      const iterator = registry.all()[Symbol.iterator]();
      expect(iterator.next()).toEqual({ done: false, value: toolA });
      expect(iterator.next()).toEqual({ done: false, value: toolB });
      expect(iterator.next().done).toBe(true);
    });

    it('keeps duplicated entries', () => {
      const registry = createRegistry([toolA, { name: 'toolA', version: '2.0.0' }]);
      expect([...registry.all()].map((r) => r.version)).toEqual(['1.2.3', '2.0.0']);
    });

    it('yields nothing for an empty registry', () => {
      expect([...createRegistry([]).all()]).toEqual([]);
    });
  });

  describe('names / has / size', () => {
    it('lists distinct names in first-seen order', () => {
      const registry = VersionRegistry.from([
        toolB,
        toolA,
        { name: 'toolB', version: '1.0.0' },
      ]);
      expect(registry.names()).toEqual(['toolB', 'toolA']);
      expect(registry.size).toBe(3);
      expect(registry.has('toolA')).toBe(true);
      expect(registry.has('toolC')).toBe(false);
    });
  });

  describe('validate', () => {
    it('succeeds for distinct, well-formed records', () => {
      const registry = createRegistry([toolA, toolB]);
      expect(registry.validate()).toEqual({ ok: true, value: undefined });
    });

    it('fails on a duplicated name and names it', () => {
      const registry = createRegistry([
        { name: 'toolA', version: '1.2.3' },
        { name: 'toolA', version: '4.5.6' },
      ]);

      const result = registry.validate();
      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error).toBeInstanceOf(ValidationError);
        expect(result.error.records).toEqual(['toolA']);
        expect(result.error.issues).toEqual([
          {
            severity: 'error',
            code: 'DUPLICATE_NAME',
            message: 'Dependency "toolA" is declared 2 times (entries 0, 1)',
            path: 'dependencies[1].name',
            record: 'toolA',
          },
        ]);
      }
    });

    it('lists every offending record in the error message', () => {
      const registry = createRegistry([toolA, toolB]);
      const result = registry.validate({ requireIntegrity: true });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.message).toBe(
          'Dependency table is invalid (1 offending record(s): toolB):\n' +
            '  - Dependency "toolB" is pinned to 9.9.9 without an integrity hash',
        );
      }
    });

    it('leaves warnings out of the error', () => {
      const registry = createRegistry([toolA, { name: 'toolB', version: '' }]);
      const result = registry.validate({ requireIntegrity: ['toolQ'] });

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.issues.map((i) => i.code)).toEqual(['EMPTY_VERSION']);
      }
    });
  });

  describe('assertValid', () => {
    it('returns quietly for a valid registry', () => {
      expect(() => createRegistry([toolA, toolB]).assertValid()).not.toThrow();
    });

    it('throws the ValidationError', () => {
      const registry = createRegistry([toolA, toolA]);
      expect(() => registry.assertValid()).toThrow(ValidationError);
    });
  });
});
