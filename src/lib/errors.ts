export type ValidationErrorCode =
  | 'invalid_id'
  | 'duplicate_caregiver_id'
  | 'invalid_name'
  | 'invalid_phone'
  | 'invalid_email'
  | 'invalid_pay_rate'
  | 'invalid_hours'
  | 'invalid_availability_status'
  | 'invalid_shift'
  | 'invalid_date'
  | 'invalid_month'
  | 'invalid_year'

export class ValidationError extends Error {
  readonly code: ValidationErrorCode
  readonly field: string

  constructor(code: ValidationErrorCode, field: string, message: string) {
    super(message)
    this.name = 'ValidationError'
    this.code = code
    this.field = field
  }
}

export function isValidationError(error: unknown): error is ValidationError {
  return error instanceof ValidationError
}
