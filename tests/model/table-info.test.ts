import { describe, it, expect } from 'vitest';
import {
  InvalidModelError,
  Model,
  TableInfo,
  isAbstractModel,
  isModel,
} from '../../src/index.js';
import { Money, NotAModel, Note, Reminder, Tag, Timestamped } from '../helpers/fixtures.js';

describe('isModel', () => {
  it('accepts classes extending Model', () => {
    expect(isModel(Note)).toBe(true);
    expect(isModel(Reminder)).toBe(true);
    expect(isModel(Timestamped)).toBe(true);
    expect(isModel(Model)).toBe(true);
  });

  it('rejects other values', () => {
    expect(isModel(Money)).toBe(false);
    expect(isModel(NotAModel)).toBe(false);
    expect(isModel(new Tag())).toBe(false);
    expect(isModel('acme.notes.Note')).toBe(false);
    expect(isModel(null)).toBe(false);
  });
});

describe('isAbstractModel', () => {
  it('is true only for classes declaring the marker themselves', () => {
    expect(isAbstractModel(Model)).toBe(true);
    expect(isAbstractModel(Timestamped)).toBe(true);
    expect(isAbstractModel(Reminder)).toBe(false);
    expect(isAbstractModel(Note)).toBe(false);
  });

  it('treats an abstract class without the marker as concrete', () => {
    abstract class Unmarked extends Model {}

    expect(isAbstractModel(Unmarked)).toBe(false);
  });
});

describe('TableInfo', () => {
  it('uses declared table options', () => {
    const info = new TableInfo(Reminder);

    expect(info.type).toBe(Reminder);
    expect(info.tableName).toBe('reminders');
    expect(info.idName).toBe('reminder_id');
  });

  it('defaults the id column name', () => {
    const info = new TableInfo(Note);

    expect(info.tableName).toBe('notes');
    expect(info.idName).toBe('Id');
  });

  it('defaults the table name to the class name', () => {
    expect(new TableInfo(Tag).tableName).toBe('Tag');
  });

  it('throws InvalidModelError for a type without the entity capability', () => {
    expect(() => new TableInfo(NotAModel)).toThrow(InvalidModelError);
    expect(() => new TableInfo(NotAModel)).toThrow('Not a model type: NotAModel');
  });

  it('throws InvalidModelError for non-function values', () => {
    expect(() => new TableInfo(undefined)).toThrow('Not a model type: undefined');
  });
});
