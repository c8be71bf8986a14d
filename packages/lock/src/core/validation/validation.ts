import { ConfigurationError } from "@vellum/errors"

export function assertValidTimeMs(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${name} must be a non-negative finite number, got: ${value}`)
  }
}
