import { UnprocessableEntityException } from '@nestjs/common';
import { ZodValidationPipe } from '../common/zod-validation.pipe';
import { JourneyRequestSchema } from './journey-request.schema';

describe('JourneyRequestSchema through ZodValidationPipe', () => {
  const pipe = new ZodValidationPipe(JourneyRequestSchema);

  function rejection(value: unknown): unknown {
    try {
      pipe.transform(value);
    } catch (error) {
      expect(error).toBeInstanceOf(UnprocessableEntityException);
      return error instanceof UnprocessableEntityException ? error.getResponse() : undefined;
    }
    throw new Error('expected the pipe to reject');
  }

  it('fills in defaults', () => {
    expect(pipe.transform({ origin: 'Colombo', destination: 'Kandy' })).toEqual({
      origin: 'Colombo',
      destination: 'Kandy',
      language: 'en',
      mode_preference: 'fastest',
      accessibility_needs: false,
    });
  });

  it('accepts any string for language and preference', () => {
    const parsed = pipe.transform({ origin: '', destination: '', language: 'xx', mode_preference: 'scenic' });

    expect(parsed.language).toBe('xx');
    expect(parsed.mode_preference).toBe('scenic');
  });

  it.each([
    [true, true],
    ['YES', true],
    [' off ', false],
    [1, true],
    [0, false],
    ['false', false],
  ])('reads accessibility_needs %p as %p', (input, expected) => {
    const parsed = pipe.transform({ origin: 'A', destination: 'B', accessibility_needs: input });

    expect(parsed.accessibility_needs).toBe(expected);
  });

  it('reports a missing origin', () => {
    expect(rejection({ destination: 'Galle' })).toEqual({
      statusCode: 422,
      message: 'Validation failed',
      detail: [{ loc: ['body', 'origin'], msg: 'Required', type: 'invalid_type' }],
    });
  });

  it('reports values of the wrong type', () => {
    expect(rejection({ origin: 42, destination: 'Galle', accessibility_needs: 'maybe' })).toEqual({
      statusCode: 422,
      message: 'Validation failed',
      detail: [
        { loc: ['body', 'origin'], msg: 'Expected string, received number', type: 'invalid_type' },
        { loc: ['body', 'accessibility_needs'], msg: 'Expected boolean, received string', type: 'invalid_type' },
      ],
    });
  });

  it('reports a body that is not an object', () => {
    expect(rejection(null)).toEqual({
      statusCode: 422,
      message: 'Validation failed',
      detail: [{ loc: ['body'], msg: 'Expected object, received null', type: 'invalid_type' }],
    });
  });
});
