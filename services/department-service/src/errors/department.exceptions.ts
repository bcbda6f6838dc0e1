import {
  BadRequestException,
  ConflictException,
  InternalServerErrorException,
  NotFoundException,
} from '@nestjs/common';

/**
 * Caller input was rejected. `violations` holds every rule that failed;
 * the first one is also the exception message.
 */
export class DepartmentValidationException extends BadRequestException {
  readonly violations: string[];

  constructor(violations: string[]) {
    super(violations[0] ?? 'Department validation failed.');
    this.violations = violations;
  }
}

/** Storage failed, or reported no effect where one was expected. */
export class DepartmentPersistenceException extends InternalServerErrorException {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
  }
}

export function departmentNotFound(id: number): NotFoundException {
  return new NotFoundException(`Department with ID ${id} does not exist.`);
}

export function duplicateDepartmentName(name: string): ConflictException {
  return new ConflictException(`A department with name '${name}' already exists.`);
}

/** Errors the service reports as they are instead of wrapping them. */
export function isDepartmentError(error: unknown): boolean {
  return (
    error instanceof BadRequestException ||
    error instanceof NotFoundException ||
    error instanceof ConflictException ||
    error instanceof DepartmentPersistenceException
  );
}
