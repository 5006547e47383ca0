/**
 * Environment overrides
 *
 * Reads GEOCELL_* variables from process.env (or any record), and from
 * .env files through dotenv.
 *
 * Variables:
 * - GEOCELL_DEFAULT_MAX_CELLS
 * - GEOCELL_ABSOLUTE_MAX_CELLS
 * - GEOCELL_FINE_RADIUS_KM
 * - GEOCELL_MEDIUM_RADIUS_KM
 * - GEOCELL_POLE_THRESHOLD
 * - GEOCELL_DEBUG (1/true installs the console logger)
 * - GEOCELL_LOG_LEVEL (debug, info, warn or error; console logger at that level)
 *
 * @module config/env
 */

import { readFileSync } from 'node:fs'
import { parse } from 'dotenv'
import { ConfigurationError } from '../errors'
import { LOG_LEVELS, consoleLogger, createConsoleLogger, isLogLevel, setLogger, type Logger } from '../utils/logger'
import { resolveConfig, setConfig, type GeoCellConfig, type GeoCellConfigInput } from './index'

export type EnvSource = Readonly<Record<string, string | undefined>>

const NUMERIC_VARIABLES = {
  GEOCELL_DEFAULT_MAX_CELLS: 'defaultMaxCells',
  GEOCELL_ABSOLUTE_MAX_CELLS: 'absoluteMaxCells',
  GEOCELL_FINE_RADIUS_KM: 'fineRadiusKm',
  GEOCELL_MEDIUM_RADIUS_KM: 'mediumRadiusKm',
  GEOCELL_POLE_THRESHOLD: 'poleThresholdDegrees',
} as const satisfies Record<string, keyof GeoCellConfigInput>

function parseNumber(name: string, raw: string): number {
  const trimmed = raw.trim()
  const value = trimmed === '' ? Number.NaN : Number(trimmed)
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`${name} must be numeric, got "${raw}"`, { key: name, value: raw })
  }
  return value
}

/**
 * Collect configuration overrides from environment variables.
 * Unset variables are skipped; validation happens in resolveConfig.
 *
 * @throws {ConfigurationError} If a variable is set but not numeric
 */
export function configFromEnv(env: EnvSource = process.env): GeoCellConfigInput {
  const input: GeoCellConfigInput = {}
  for (const [name, key] of Object.entries(NUMERIC_VARIABLES)) {
    const raw = env[name]
    if (raw === undefined) continue
    input[key] = parseNumber(name, raw)
  }
  return input
}

/**
 * Collect configuration overrides from a .env file
 *
 * @param path - Path to a dotenv-formatted file
 */
export function configFromEnvFile(path: string): GeoCellConfigInput {
  let contents: string
  try {
    contents = readFileSync(path, 'utf8')
  } catch (error) {
    throw new ConfigurationError(
      `Cannot read env file ${path}`,
      { key: 'path', value: path },
      error instanceof Error ? error : undefined
    )
  }
  return configFromEnv(parse(contents))
}

function isTruthyFlag(raw: string | undefined): boolean {
  if (raw === undefined) return false
  const normalized = raw.trim().toLowerCase()
  return normalized === '1' || normalized === 'true'
}

/**
 * Resolve configuration from the environment and install it process-wide
 * with setConfig, along with a console logger when GEOCELL_LOG_LEVEL or
 * GEOCELL_DEBUG asks for one. GEOCELL_LOG_LEVEL wins when both are set.
 * Nothing is installed when any value is invalid.
 *
 * @throws {ConfigurationError} For invalid values, including an unknown log level
 */
export function configureFromEnv(env: EnvSource = process.env): Readonly<GeoCellConfig> {
  const input = configFromEnv(env)
  // Validate before installing anything
  resolveConfig(input)

  let sink: Logger | undefined
  const rawLevel = env.GEOCELL_LOG_LEVEL
  if (rawLevel !== undefined && rawLevel.trim() !== '') {
    const level = rawLevel.trim().toLowerCase()
    if (!isLogLevel(level)) {
      throw new ConfigurationError(
        `GEOCELL_LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}, got "${rawLevel}"`,
        { key: 'GEOCELL_LOG_LEVEL', value: rawLevel }
      )
    }
    sink = createConsoleLogger(level)
  } else if (isTruthyFlag(env.GEOCELL_DEBUG)) {
    sink = consoleLogger
  }

  const config = setConfig(input)
  if (sink !== undefined) setLogger(sink)
  return config
}
