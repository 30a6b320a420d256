import { deserializeAccount, isCalendarDate } from '@/validators/account.validator';
import { DataValidationError, ValidationError } from '@/errors';

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}

describe('deserializeAccount', () => {
  it('should map a complete wire payload to account input', () => {
    const input = deserializeAccount({
      name: 'Ada Lovelace',
      email: 'ada@example.com',
      address: '12 Analytical Row',
      phone_number: '555-0100',
      date_joined: '2024-01-01',
    });

    expect(input).toEqual({
      name: 'Ada Lovelace',
      email: 'ada@example.com',
      address: '12 Analytical Row',
      phoneNumber: '555-0100',
      dateJoined: '2024-01-01',
    });
  });

  it('should accept a payload with only name and email', () => {
    const input = deserializeAccount({ name: 'Ada', email: 'ada@example.com' });

    expect(input.name).toBe('Ada');
    expect(input.email).toBe('ada@example.com');
    expect(input.address).toBeUndefined();
    expect(input.phoneNumber).toBeUndefined();
    expect(input.dateJoined).toBeUndefined();
  });

  it('should treat null optional fields as absent', () => {
    const input = deserializeAccount({
      name: 'Ada',
      email: 'ada@example.com',
      address: null,
      phone_number: null,
      date_joined: null,
    });

    expect(input.address).toBeUndefined();
    expect(input.phoneNumber).toBeUndefined();
    expect(input.dateJoined).toBeUndefined();
  });

  it('should never take the id from the payload', () => {
    const input = deserializeAccount({ id: 42, name: 'Ada', email: 'ada@example.com' });

    expect(input).not.toHaveProperty('id');
  });

  it('should drop unknown keys', () => {
    const input = deserializeAccount({ name: 'Ada', email: 'ada@example.com', role: 'admin' });

    expect(input).not.toHaveProperty('role');
  });

  it('should report a missing email field', () => {
    const error = captureError(() => deserializeAccount({ name: 'not enough data' }));

    expect(error).toBeInstanceOf(ValidationError);
    expect(error).not.toBeInstanceOf(DataValidationError);
    expect(error).toMatchObject({
      message: 'Invalid Account',
      statusCode: 400,
      errors: [{ field: 'email', message: 'Required' }],
    });
  });

  it('should report every missing required field in schema order', () => {
    const error = captureError(() => deserializeAccount({}));

    expect(error).toMatchObject({
      errors: [
        { field: 'name', message: 'Required' },
        { field: 'email', message: 'Required' },
      ],
    });
  });

  it('should reject an empty name', () => {
    const error = captureError(() => deserializeAccount({ name: '', email: 'ada@example.com' }));

    expect(error).toMatchObject({
      errors: [{ field: 'name', message: 'Name must not be empty' }],
    });
  });

  it('should reject a field of the wrong type', () => {
    const error = captureError(() => deserializeAccount({ name: 42, email: 'ada@example.com' }));

    expect(error).toMatchObject({
      errors: [{ field: 'name', message: 'Expected string, received number' }],
    });
  });

  it('should reject a date_joined that is not a calendar date', () => {
    const error = captureError(() =>
      deserializeAccount({ name: 'Ada', email: 'ada@example.com', date_joined: '2024-02-30' })
    );

    expect(error).toMatchObject({
      errors: [{ field: 'date_joined', message: 'Must be a calendar date in YYYY-MM-DD format' }],
    });
  });

  it.each([
    ['name', 64],
    ['email', 64],
    ['address', 256],
    ['phone_number', 32],
  ])('should reject a %s longer than %i characters', (field, max) => {
    const payload = { name: 'Ada', email: 'ada@example.com', [field]: 'x'.repeat(max + 1) };

    const error = captureError(() => deserializeAccount(payload));

    expect(error).toMatchObject({
      errors: [{ field, message: `Must be at most ${max} characters` }],
    });
  });

  it('should accept strings at the column limits', () => {
    const input = deserializeAccount({
      name: 'n'.repeat(64),
      email: 'e'.repeat(64),
      address: 'a'.repeat(256),
      phone_number: 'p'.repeat(32),
    });

    expect(input.name).toHaveLength(64);
    expect(input.address).toHaveLength(256);
    expect(input.phoneNumber).toHaveLength(32);
  });

  it('should reject a date_joined in year zero', () => {
    const error = captureError(() =>
      deserializeAccount({ name: 'Ada', email: 'ada@example.com', date_joined: '0000-01-01' })
    );

    expect(error).toMatchObject({
      errors: [{ field: 'date_joined', message: 'Must be a calendar date in YYYY-MM-DD format' }],
    });
  });

  it.each([
    ['an array', [{ name: 'Ada', email: 'ada@example.com' }]],
    ['a string', 'Ada'],
    ['a number', 7],
    ['null', null],
  ])('should raise DataValidationError when the payload is %s', (_label, payload) => {
    const error = captureError(() => deserializeAccount(payload));

    expect(error).toBeInstanceOf(DataValidationError);
    expect(error).toMatchObject({
      message: 'Invalid Account: body of request contained bad or no data',
      statusCode: 400,
    });
  });
});

describe('isCalendarDate', () => {
  it('should accept real dates including leap days', () => {
    expect(isCalendarDate('2024-01-01')).toBe(true);
    expect(isCalendarDate('2024-02-29')).toBe(true);
  });

  it('should reject impossible dates', () => {
    expect(isCalendarDate('2023-02-29')).toBe(false);
    expect(isCalendarDate('2024-13-01')).toBe(false);
  });

  it('should reject year zero and accept year one', () => {
    expect(isCalendarDate('0000-01-01')).toBe(false);
    expect(isCalendarDate('0001-01-01')).toBe(true);
  });

  it('should reject other formats', () => {
    expect(isCalendarDate('01/15/2024')).toBe(false);
    expect(isCalendarDate('2024-1-5')).toBe(false);
    expect(isCalendarDate('2024-01-15T00:00:00Z')).toBe(false);
  });
});
