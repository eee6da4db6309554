/** Per-field validation problem attached to a ValidationError. */
export type validationErrorType = {
  field: string;
  message: string;
  value?: string;
};
