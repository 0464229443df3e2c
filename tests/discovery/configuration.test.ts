import { describe, it, expect, vi } from 'vitest';
import {
  InvalidModelError,
  Model,
  RegistryBuilder,
  ScanRecorder,
  defineConfiguration,
  loadFromConfiguration,
  noopLogger,
} from '../../src/index.js';
import {
  Money,
  MoneySerializer,
  MoneyTextSerializer,
  NotAModel,
  Note,
  Reminder,
  Tag,
  ThrowingSerializer,
  Timestamped,
  createTestContext,
} from '../helpers/fixtures.js';

const context = createTestContext({ dataDir: '/nonexistent/data', sourcePath: '/nonexistent/app.bundle' });

describe('defineConfiguration', () => {
  it('is valid when it declares model types', () => {
    expect(defineConfiguration({ context, modelTypes: [Note] }).valid).toBe(true);
  });

  it('is invalid without model types', () => {
    expect(defineConfiguration({ context }).valid).toBe(false);
    expect(defineConfiguration({ context, serializerTypes: [MoneySerializer] }).valid).toBe(false);
  });

  it('takes an explicit validity flag', () => {
    expect(defineConfiguration({ context, valid: true }).valid).toBe(true);
    expect(defineConfiguration({ context, modelTypes: [Note], valid: false }).valid).toBe(false);
  });
});

describe('loadFromConfiguration', () => {
  it('registers exactly the declared models', () => {
    const builder = new RegistryBuilder();
    const configuration = defineConfiguration({ context, modelTypes: [Note, Tag, Reminder] });

    expect(loadFromConfiguration(configuration, builder, new ScanRecorder(noopLogger))).toBe(true);

    const tableInfos = builder.snapshot().tableInfos;
    expect(tableInfos.size).toBe(3);
    expect([...tableInfos.keys()]).toEqual([Note, Tag, Reminder]);
  });

  it('registers nothing for an invalid configuration', () => {
    const builder = new RegistryBuilder();
    const configuration = defineConfiguration({ context, serializerTypes: [MoneySerializer] });

    expect(loadFromConfiguration(configuration, builder, new ScanRecorder(noopLogger))).toBe(false);
    expect(builder.snapshot().tableInfos.size).toBe(0);
    expect(builder.snapshot().serializers.has(Money)).toBe(false);
  });

  it('skips serializers that cannot be instantiated and keeps the rest', () => {
    const builder = new RegistryBuilder();
    const onError = vi.fn();
    const configuration = defineConfiguration({
      context,
      modelTypes: [Note],
      serializerTypes: [ThrowingSerializer, MoneyTextSerializer],
    });

    loadFromConfiguration(configuration, builder, new ScanRecorder(noopLogger, onError));

    expect(onError).toHaveBeenCalledTimes(1);
    expect(builder.snapshot().serializers.get(Money)).toBeInstanceOf(MoneyTextSerializer);
  });

  it('lets the last declared serializer win', () => {
    const builder = new RegistryBuilder();
    const configuration = defineConfiguration({
      context,
      modelTypes: [Note],
      serializerTypes: [MoneyTextSerializer, MoneySerializer],
    });

    loadFromConfiguration(configuration, builder, new ScanRecorder(noopLogger));

    expect(builder.snapshot().serializers.get(Money)).toBeInstanceOf(MoneySerializer);
  });

  it('propagates schema descriptor errors', () => {
    const builder = new RegistryBuilder();
    const configuration = defineConfiguration({ context, modelTypes: [Note, NotAModel] });

    expect(() => loadFromConfiguration(configuration, builder, new ScanRecorder(noopLogger))).toThrow(
      InvalidModelError
    );
  });

  it('rejects abstract declared model types', () => {
    const builder = new RegistryBuilder();
    const configuration = defineConfiguration({ context, modelTypes: [Note, Timestamped] });

    expect(() => loadFromConfiguration(configuration, builder, new ScanRecorder(noopLogger))).toThrow(
      'Abstract model type: Timestamped'
    );
    expect(builder.hasModel(Timestamped)).toBe(false);
  });

  it('rejects the model base class', () => {
    const builder = new RegistryBuilder();
    const configuration = defineConfiguration({ context, modelTypes: [Model] });

    expect(() => loadFromConfiguration(configuration, builder, new ScanRecorder(noopLogger))).toThrow(
      InvalidModelError
    );
    expect(builder.hasModel(Model)).toBe(false);
  });
});
