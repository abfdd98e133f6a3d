// Module result envelope shared by the assembler and the batch pipeline

export type ModuleError = {
  code: string;
  module: string;
  data: Record<string, unknown>;
  correlationId: string;
};

export type Result<T, E> = {
  isSuccess(): this is { value: T };
  isError(): this is { errors: E };
  value?: T;
  errors?: E;
};

export function Ok<T>(value: T): Result<T, never> {
  return {
    isSuccess(): this is { value: T } {
      return true;
    },
    isError(): this is { errors: never } {
      return false;
    },
    value,
  };
}

export function Err<E>(errors: E): Result<never, E> {
  return {
    isSuccess(): this is { value: never } {
      return false;
    },
    isError(): this is { errors: E } {
      return true;
    },
    errors,
  };
}
