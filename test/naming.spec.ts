import { describe, expect, it } from 'vitest';
import { camelize, lowerCamel, snakeCase } from '../src/generator/naming.js';

describe('camelize', () => {
  it('joins underscore separated segments in UpperCamelCase', () => {
    expect(camelize('user_id')).toBe('UserId');
    expect(camelize('order_line_item')).toBe('OrderLineItem');
  });

  it('capitalizes a single segment', () => {
    expect(camelize('id')).toBe('Id');
  });

  it('lower-cases upper-case identifiers before capitalizing segments', () => {
    expect(camelize('USER_ID')).toBe('UserId');
    expect(camelize('USERS')).toBe('Users');
  });

  it('does not keep inner capitals of a name without delimiters', () => {
    expect(camelize('UserId')).toBe('Userid');
  });

  it('ignores empty segments from repeated or leading delimiters', () => {
    expect(camelize('_user__id')).toBe('UserId');
  });
});

describe('lowerCamel', () => {
  it('lower-cases only the first character', () => {
    expect(lowerCamel('UserDao')).toBe('userDao');
    expect(lowerCamel('X')).toBe('x');
  });

  it('returns an empty string unchanged', () => {
    expect(lowerCamel('')).toBe('');
  });
});

describe('snakeCase', () => {
  it('splits camel case words with underscores', () => {
    expect(snakeCase('createdAt')).toBe('created_at');
    expect(snakeCase('user_id')).toBe('user_id');
  });
});
