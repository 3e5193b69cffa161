import { describe, it, expect } from 'vitest';
import { classifyPath } from '../classifier.js';

describe('classifyPath', () => {
  it('recognizes lang files', () => {
    expect(classifyPath('assets/minecraft/lang/en_us.json')).toBe('lang');
    expect(classifyPath('assets/mymod/lang/zh_cn.json')).toBe('lang');
  });

  it('treats non-JSON lang files as opaque', () => {
    expect(classifyPath('assets/minecraft/lang/en_us.lang')).toBe('opaque');
  });

  it('matches the .json extension case-sensitively', () => {
    expect(classifyPath('assets/minecraft/lang/EN_US.JSON')).toBe('opaque');
    expect(classifyPath('data/ns/tags/items/logs.Json')).toBe('opaque');
  });

  it('recognizes the sounds index only directly under a namespace', () => {
    expect(classifyPath('assets/minecraft/sounds.json')).toBe('sounds-index');
    expect(classifyPath('assets/minecraft/sounds/sounds.json')).toBe('opaque');
    expect(classifyPath('assets/sounds.json')).toBe('opaque');
  });

  it('recognizes font and atlas definitions', () => {
    expect(classifyPath('assets/minecraft/font/default.json')).toBe('font-definition');
    expect(classifyPath('assets/minecraft/atlases/blocks.json')).toBe('atlas-definition');
    expect(classifyPath('assets/minecraft/font/ascii.png')).toBe('opaque');
  });

  it('recognizes tag lists at any depth under tags', () => {
    expect(classifyPath('data/minecraft/tags/items/logs.json')).toBe('tag-list');
    expect(classifyPath('data/minecraft/tags/blocks/mineable/axe.json')).toBe('tag-list');
    expect(classifyPath('data/minecraft/recipes/bread.json')).toBe('opaque');
  });

  it('does not apply asset rules under data or data rules under assets', () => {
    expect(classifyPath('data/minecraft/lang/en_us.json')).toBe('opaque');
    expect(classifyPath('assets/minecraft/tags/items/logs.json')).toBe('opaque');
  });

  it('treats other assets as opaque', () => {
    expect(classifyPath('assets/minecraft/textures/block/stone.png')).toBe('opaque');
    expect(classifyPath('assets/minecraft/models/block/stone.json')).toBe('opaque');
  });

  it('accepts backslash separators', () => {
    expect(classifyPath('assets\\minecraft\\lang\\en_us.json')).toBe('lang');
  });

  it('returns null outside the namespace roots', () => {
    expect(classifyPath('pack.mcmeta')).toBeNull();
    expect(classifyPath('pack.png')).toBeNull();
    expect(classifyPath('docs/readme.md')).toBeNull();
  });
});
