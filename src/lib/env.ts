/**
 * AR.IO Gateway
 * Copyright (C) 2022-2025 Permanent Data Solutions, Inc. All Rights Reserved.
 *
 * SPDX-License-Identifier: AGPL-3.0-or-later
 */
import { ConfigurationError } from './error.js';

export function varOrDefault(envVarName: string, defaultValue: string): string {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : defaultValue;
}

export function varOrUndefined(envVarName: string): string | undefined {
  const value = process.env[envVarName];
  return value !== undefined && value.trim() !== '' ? value : undefined;
}

export function flagOrDefault(envVarName: string, defaultValue: boolean): boolean {
  return varOrDefault(envVarName, `${defaultValue}`).toLowerCase() === 'true';
}

// Anything other than a positive integer is a configuration error
export function positiveIntOrDefault(
  envVarName: string,
  defaultValue: number,
): number {
  const raw = varOrDefault(envVarName, `${defaultValue}`);
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigurationError(
      `${envVarName} must be a positive integer, got: ${raw}`,
      { variable: envVarName },
    );
  }
  return value;
}

export function listOrDefault(
  envVarName: string,
  defaultValue: readonly string[],
): string[] {
  const value = varOrUndefined(envVarName);
  if (value === undefined) {
    return [...defaultValue];
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}
