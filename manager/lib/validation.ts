/**
 * Security-critical input validation
 * Every value that reaches a bsub/bjobs/bkill/ssh argv passes one of these guards.
 *
 * Also provides Joi schemas for API request validation.
 */

import { Request, Response, NextFunction } from 'express';
import Joi from 'joi';
import { ValidationError } from './errors';

// ============================================
// Joi Schemas for API Validation
// ============================================

const username = Joi.string().max(64).pattern(/^[A-Za-z0-9._@-]+$/);
const optionalIntList = Joi.array().items(Joi.number().integer().min(1)).allow(null);
const optionalStringList = Joi.array().items(Joi.string().max(64)).allow(null);

export const schemas = {
  login: Joi.object({
    username: Joi.string().trim().min(1).max(256).required(),
    password: Joi.string().min(1).max(1024).required(),
  }),

  createSession: Joi.object({
    name: Joi.string().trim().max(64).allow(''),
    resolution: Joi.string().pattern(/^\d{3,5}x\d{3,5}$/),
    window_manager: Joi.string().max(32),
    wm: Joi.string().max(32),
    color_depth: Joi.number().integer().valid(8, 16, 24, 32),
    site: Joi.string().max(64).allow(''),
    queue: Joi.string().max(64),
    num_cores: Joi.number().integer().min(1).max(1024),
    memory_gb: Joi.number().positive().max(16384),
    os: Joi.string().max(64).allow(''),
  }),

  copySession: Joi.object({
    session_id: Joi.alternatives().try(Joi.string(), Joi.number()).required(),
  }),

  userSettings: Joi.object({
    settings: Joi.object().unknown(true).required(),
  }),

  saveOverride: Joi.object({
    username: username.required(),
    overrides: Joi.object({
      cores: optionalIntList,
      memory: optionalIntList,
      window_managers: optionalStringList,
      queues: optionalStringList,
      os_options: optionalStringList,
    }).default({}),
  }),

  deleteOverride: Joi.object({
    username: username.required(),
  }),
};

/**
 * Express middleware factory for Joi validation
 * @param property - Request property to validate
 */
export function validate(
  schema: Joi.Schema,
  property: 'body' | 'query' | 'params' = 'body'
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction) => {
    const { error, value } = schema.validate(req[property] ?? {}, {
      abortEarly: false,
      stripUnknown: true,
    });

    if (error) {
      const details = error.details.map(d => ({
        field: d.path.join('.'),
        message: d.message,
      }));

      res.status(400).json({
        success: false,
        message: 'Validation failed',
        error: 'Validation failed',
        details,
      });
      return;
    }

    // Replace with validated/sanitized values
    if (property === 'body') {
      req.body = value;
    }
    next();
  };
}

// ============================================
// Query Parameter Helpers
// ============================================

/**
 * Safely extract a string query parameter
 * Express query params can be string | string[] | ParsedQs | ParsedQs[] | undefined
 */
export function queryString(value: unknown): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'string') return value;
  if (Array.isArray(value) && value.length > 0) {
    const first = value[0];
    return typeof first === 'string' ? first : undefined;
  }
  return undefined;
}

interface ParseQueryIntOptions {
  min?: number;
  max?: number;
}

/**
 * Parse integer query parameter with default value
 */
export function parseQueryInt(
  query: Record<string, unknown> | undefined,
  name: string,
  defaultValue: number,
  options: ParseQueryIntOptions = {}
): number {
  const raw = query?.[name];
  if (raw === undefined || raw === null || raw === '') {
    return defaultValue;
  }

  const parsed = parseInt(String(raw), 10);
  if (isNaN(parsed)) {
    return defaultValue;
  }

  if (options.min !== undefined && parsed < options.min) {
    return options.min;
  }
  if (options.max !== undefined && parsed > options.max) {
    return options.max;
  }

  return parsed;
}

// ============================================
// Shell Argument Guards
// ============================================

/**
 * Validate an LSF job ID ("12345" or array element "12345[3]")
 * @throws ValidationError
 */
export function validateJobId(jobId: string): string {
  const trimmed = String(jobId).trim();
  if (!/^\d+(\[\d+\])?$/.test(trimmed)) {
    throw new ValidationError(`Invalid job ID: ${jobId}`);
  }
  return trimmed;
}

export function validateHostname(host: string): string {
  if (!/^[A-Za-z0-9.-]+$/.test(host) || host.startsWith('-')) {
    throw new ValidationError(`Invalid hostname: ${host}`);
  }
  return host;
}

export function validateResolution(resolution: string): string {
  if (!/^\d{3,5}x\d{3,5}$/.test(resolution)) {
    throw new ValidationError(`Invalid resolution: ${resolution}. Use WIDTHxHEIGHT, e.g. 1920x1080`);
  }
  return resolution;
}

/**
 * Session names end up as a vncserver -name argument and in bjobs output
 * parsed on ';', so quotes, separators and control characters are rejected.
 */
export function validateSessionName(name: string): string {
  if (name.length > 64) {
    throw new ValidationError('Session name must be at most 64 characters');
  }
  if (/["'`;$\\|&<>\x00-\x1f]/.test(name)) {
    throw new ValidationError('Session name contains characters that are not allowed');
  }
  return name;
}

export function validateUsername(name: string): string {
  if (!/^[A-Za-z0-9._-]+$/.test(name) || name.startsWith('-')) {
    throw new ValidationError(`Invalid username: ${name}`);
  }
  return name;
}
