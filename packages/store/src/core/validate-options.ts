import { ConfigurationError } from "@vellum/errors"

export function assertPositiveInteger(value: number, name: string): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(`${name} must be a positive integer, got: ${value}`)
  }
}
