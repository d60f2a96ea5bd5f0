import { Availability, UnavailableReason } from '../types/dashboard';

/**
 * Raised when the mandatory primary dataset cannot drive the dashboard.
 * Every other data problem degrades to a placeholder instead.
 */
export class FatalConfigurationError extends Error {
  constructor(
    message: string,
    public readonly dataset: string,
    public readonly column?: string,
  ) {
    super(message);
    this.name = 'FatalConfigurationError';
  }
}

export function missingColumn(dataset: string, ...columns: string[]): UnavailableReason {
  const list = columns.map((c) => `\`${c}\``).join(' / ');
  const noun = columns.length > 1 ? 'Columns' : 'Column';
  const verb = columns.length > 1 ? 'are' : 'is';
  return {
    code: 'missing_column',
    message: `${noun} ${list} ${verb} missing in ${dataset}.`,
  };
}

export function missingDataset(...files: string[]): UnavailableReason {
  const verb = files.length > 1 ? 'are' : 'is';
  return {
    code: 'missing_dataset',
    message: `${files.join(' or ')} ${verb} missing.`,
  };
}

export function available<T>(data: T): Availability<T> {
  return { status: 'available', data };
}

export function unavailable<T>(reason: UnavailableReason): Availability<T> {
  return { status: 'unavailable', reason };
}
