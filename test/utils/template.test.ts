import { describe, it, expect } from 'vitest';
import { fillTemplate } from '../../src/utils/template.js';

describe('fillTemplate', () => {
  it('replaces every occurrence of a placeholder', () => {
    expect(fillTemplate('{name} and {name}', { name: 'Ada' })).toBe('Ada and Ada');
  });

  it('keeps unknown placeholders', () => {
    expect(fillTemplate('Hi {name}, {unknown}', { name: 'Ada' })).toBe('Hi Ada, {unknown}');
  });

  it('does not expand placeholders inside values', () => {
    expect(fillTemplate('{a}|{b}', { a: '{b}', b: 'x' })).toBe('{b}|x');
  });

  it('inserts replacement patterns literally', () => {
    expect(fillTemplate('cost: {price}', { price: "$& $1 $'" })).toBe("cost: $& $1 $'");
  });
});
