import type { INestApplicationContext } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { AppModule } from '../../src/app.module';
import { createCliContext } from '../../src/cli/main';

describe('createCliContext', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should boot without letting Nest abort the process', async () => {
    const app = { close: jest.fn() } as unknown as INestApplicationContext;
    const create = jest
      .spyOn(NestFactory, 'createApplicationContext')
      .mockResolvedValue(app);

    await expect(createCliContext(undefined)).resolves.toBe(app);

    expect(create).toHaveBeenCalledWith(AppModule, {
      logger: ['fatal', 'error', 'warn', 'log'],
      abortOnError: false,
    });
  });

  it('should surface bootstrap failures to the caller', async () => {
    jest
      .spyOn(NestFactory, 'createApplicationContext')
      .mockRejectedValue(new Error('Nest can\'t resolve dependencies'));

    await expect(createCliContext('warn')).rejects.toThrow(
      "Nest can't resolve dependencies",
    );
  });
});
