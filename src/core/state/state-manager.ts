/**
 * Change state record
 *
 * One STATE.yaml per change directory holding the workflow phase, content
 * checksums of the tracked documents, the validation history and LLM usage
 * telemetry. A StateManager is an explicit handle on one record: load it,
 * mutate it, save it. Nothing is shared between handles.
 */

import { readFile, writeFile } from 'node:fs/promises';
import { basename, join, resolve } from 'node:path';
import YAML from 'yaml';
import type { SeverityCounts, ValidationMode } from '../../types/index.js';
import { computeChecksum, isRecord } from '../document/header.js';
import { STATE_FILE, fileExists, listTrackedFiles } from '../services/change-files.js';
import { RULES_VERSION } from '../validator/rules.js';
import { errors } from '../../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export const SCHEMA_VERSION = '2.0';

export const PHASES = ['proposed', 'challenged', 'rejected', 'implementing', 'complete', 'archived'] as const;

export type Phase = (typeof PHASES)[number];

export interface ChecksumEntry {
  hash: string;
  validated_at: string;
}

export interface ValidationSummary {
  valid: boolean;
  high: number;
  medium: number;
  low: number;
  verdict?: string;
  issues_parsed?: number;
}

export interface ValidationEntry {
  step: string;
  timestamp: string;
  rules_version: string;
  rules_hash?: string;
  mode: ValidationMode;
  result: ValidationSummary;
  errors: string[];
  warnings: string[];
}

export interface LlmCall {
  step: string;
  model?: string;
  tokens_in?: number;
  tokens_out?: number;
  cost_usd?: number;
  duration_ms?: number;
  timestamp: string;
}

export interface Telemetry {
  calls: LlmCall[];
  total_tokens_in: number;
  total_tokens_out: number;
  total_cost_usd: number;
  total_duration_ms: number;
}

export interface ChangeState {
  change_id: string;
  schema_version: string;
  created_at: string;
  updated_at: string;
  phase: Phase;
  iteration: number;
  last_action: string | null;
  checksums: Record<string, ChecksumEntry>;
  validations: ValidationEntry[];
  telemetry?: Telemetry;
}

/** USD per million tokens */
export interface LlmPricing {
  input: number;
  output: number;
}

export interface LlmCallInput {
  step: string;
  model?: string;
  tokensIn?: number;
  tokensOut?: number;
  durationMs?: number;
  pricing?: LlmPricing;
}

export interface ValidationInput {
  step: string;
  mode: ValidationMode;
  valid: boolean;
  counts: SeverityCounts;
  errors?: string[];
  warnings?: string[];
  rulesHash?: string;
}

export interface StateManagerOptions {
  /** Clock used for every timestamp the record gets */
  now?: () => Date;
}

// ============================================================================
// STALENESS
// ============================================================================

export class StalenessReport {
  constructor(
    readonly stale: string[],
    readonly missingChecksums: string[],
    readonly upToDate: string[]
  ) {}

  get hasStale(): boolean {
    return this.stale.length > 0;
  }

  /** Every tracked file has a recorded checksum */
  get isComplete(): boolean {
    return this.missingChecksums.length === 0;
  }

  get isFresh(): boolean {
    return !this.hasStale && this.isComplete;
  }

  get totalFiles(): number {
    return this.stale.length + this.missingChecksums.length + this.upToDate.length;
  }
}

// ============================================================================
// RECORD PARSING
// ============================================================================

function num(value: unknown, fallback = 0): number {
  return typeof value === 'number' && Number.isFinite(value) ? value : fallback;
}

function optionalNum(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function str(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function strings(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((item): item is string => typeof item === 'string') : [];
}

function parseChecksums(value: unknown): Record<string, ChecksumEntry> {
  const checksums: Record<string, ChecksumEntry> = {};
  if (!isRecord(value)) return checksums;

  for (const [name, entry] of Object.entries(value)) {
    if (isRecord(entry) && typeof entry.hash === 'string') {
      checksums[name] = { hash: entry.hash, validated_at: str(entry.validated_at) ?? '' };
    }
  }
  return checksums;
}

function parseValidation(value: unknown): ValidationEntry | null {
  if (!isRecord(value) || typeof value.step !== 'string') return null;
  const result = isRecord(value.result) ? value.result : {};

  return {
    step: value.step,
    timestamp: str(value.timestamp) ?? '',
    rules_version: str(value.rules_version) ?? RULES_VERSION,
    rules_hash: str(value.rules_hash),
    mode: value.mode === 'strict' ? 'strict' : 'normal',
    result: {
      valid: result.valid === true,
      high: num(result.high),
      medium: num(result.medium),
      low: num(result.low),
      verdict: str(result.verdict),
      issues_parsed: optionalNum(result.issues_parsed),
    },
    errors: strings(value.errors),
    warnings: strings(value.warnings),
  };
}

function parseTelemetry(value: unknown): Telemetry | undefined {
  if (!isRecord(value)) return undefined;

  const calls: LlmCall[] = [];
  for (const call of Array.isArray(value.calls) ? value.calls : []) {
    if (!isRecord(call) || typeof call.step !== 'string') continue;
    calls.push({
      step: call.step,
      model: str(call.model),
      tokens_in: optionalNum(call.tokens_in),
      tokens_out: optionalNum(call.tokens_out),
      cost_usd: optionalNum(call.cost_usd),
      duration_ms: optionalNum(call.duration_ms),
      timestamp: str(call.timestamp) ?? '',
    });
  }

  return {
    calls,
    total_tokens_in: num(value.total_tokens_in),
    total_tokens_out: num(value.total_tokens_out),
    total_cost_usd: num(value.total_cost_usd),
    total_duration_ms: num(value.total_duration_ms),
  };
}

/**
 * Build a typed record from parsed YAML, filling defaults for absent fields
 */
export function parseState(data: unknown, fallbackId: string, now: string): ChangeState {
  if (!isRecord(data)) {
    throw new Error('expected a mapping at the top level');
  }

  const phase = data.phase === undefined ? 'proposed' : PHASES.find((candidate) => candidate === data.phase);
  if (!phase) {
    throw new Error(`unknown phase '${String(data.phase)}'`);
  }

  return {
    change_id: str(data.change_id) ?? fallbackId,
    schema_version: str(data.schema_version) ?? SCHEMA_VERSION,
    created_at: str(data.created_at) ?? now,
    updated_at: str(data.updated_at) ?? now,
    phase,
    iteration: Math.max(1, Math.trunc(num(data.iteration, 1))),
    last_action: str(data.last_action) ?? null,
    checksums: parseChecksums(data.checksums),
    validations: (Array.isArray(data.validations) ? data.validations : [])
      .map(parseValidation)
      .filter((entry): entry is ValidationEntry => entry !== null),
    telemetry: parseTelemetry(data.telemetry),
  };
}

// ============================================================================
// STATE MANAGER
// ============================================================================

export class StateManager {
  private constructor(
    readonly changeDir: string,
    private record: ChangeState,
    private dirty: boolean,
    private readonly now: () => Date
  ) {}

  /**
   * Load STATE.yaml, or start a fresh record named after the directory
   */
  static async load(changeDir: string, options: StateManagerOptions = {}): Promise<StateManager> {
    const dir = resolve(changeDir);
    const now = options.now ?? (() => new Date());
    const statePath = join(dir, STATE_FILE);
    const timestamp = now().toISOString();

    if (!(await fileExists(statePath))) {
      const record: ChangeState = {
        change_id: basename(dir),
        schema_version: SCHEMA_VERSION,
        created_at: timestamp,
        updated_at: timestamp,
        phase: 'proposed',
        iteration: 1,
        last_action: null,
        checksums: {},
        validations: [],
      };
      return new StateManager(dir, record, true, now);
    }

    try {
      const content = await readFile(statePath, 'utf-8');
      return new StateManager(dir, parseState(YAML.parse(content), basename(dir), timestamp), false, now);
    } catch (error) {
      throw errors.stateReadError(statePath, error);
    }
  }

  /** A copy of the record; changes go through the tracker operations */
  get state(): ChangeState {
    return structuredClone(this.record);
  }

  get isDirty(): boolean {
    return this.dirty;
  }

  get statePath(): string {
    return join(this.changeDir, STATE_FILE);
  }

  /**
   * Write the record when it changed since the last load or save.
   * Returns whether anything was written.
   */
  async save(): Promise<boolean> {
    if (!this.dirty) return false;

    this.record.updated_at = this.timestamp();
    try {
      await writeFile(this.statePath, YAML.stringify(this.record), 'utf-8');
    } catch (error) {
      throw errors.stateWriteError(this.statePath, error);
    }
    this.dirty = false;
    return true;
  }

  // ==========================================================================
  // PHASE
  // ==========================================================================

  setPhase(phase: Phase): void {
    this.record.phase = phase;
    this.dirty = true;
  }

  incrementIteration(): void {
    this.record.iteration++;
    this.dirty = true;
  }

  setLastAction(action: string): void {
    this.record.last_action = action;
    this.dirty = true;
  }

  // ==========================================================================
  // CHECKSUMS
  // ==========================================================================

  /**
   * Record the current hash of a file, or drop its entry if the file is gone
   *
   * @param name - path relative to the change directory
   */
  async updateChecksum(name: string): Promise<void> {
    const content = await this.readTracked(name);

    if (content === null) {
      if (name in this.record.checksums) {
        delete this.record.checksums[name];
        this.dirty = true;
      }
      return;
    }

    this.record.checksums[name] = { hash: computeChecksum(content), validated_at: this.timestamp() };
    this.dirty = true;
  }

  /**
   * Refresh checksums of every tracked document and spec
   */
  async updateAllChecksums(): Promise<void> {
    for (const name of await listTrackedFiles(this.changeDir)) {
      await this.updateChecksum(name);
    }
  }

  /**
   * True when the file exists and has no checksum or a different one.
   * A file that does not exist is never stale.
   */
  async isFileStale(name: string): Promise<boolean> {
    const content = await this.readTracked(name);
    if (content === null) return false;

    const entry = this.record.checksums[name];
    if (!entry) return true;
    return entry.hash !== computeChecksum(content);
  }

  async checkStaleness(): Promise<StalenessReport> {
    const stale: string[] = [];
    const missing: string[] = [];
    const upToDate: string[] = [];

    for (const name of await listTrackedFiles(this.changeDir)) {
      if (!(name in this.record.checksums)) {
        missing.push(name);
      } else if (await this.isFileStale(name)) {
        stale.push(name);
      } else {
        upToDate.push(name);
      }
    }

    return new StalenessReport(stale, missing, upToDate);
  }

  private async readTracked(name: string): Promise<string | null> {
    const path = join(this.changeDir, name);
    if (!(await fileExists(path))) return null;
    try {
      return await readFile(path, 'utf-8');
    } catch (error) {
      throw errors.fileReadError(name, error instanceof Error ? error.message : String(error));
    }
  }

  // ==========================================================================
  // VALIDATION HISTORY
  // ==========================================================================

  recordValidation(input: ValidationInput): ValidationEntry {
    const entry: ValidationEntry = {
      step: input.step,
      timestamp: this.timestamp(),
      rules_version: RULES_VERSION,
      rules_hash: input.rulesHash,
      mode: input.mode,
      result: { valid: input.valid, ...input.counts },
      errors: [...(input.errors ?? [])],
      warnings: [...(input.warnings ?? [])],
    };
    this.record.validations.push(entry);
    this.dirty = true;
    return structuredClone(entry);
  }

  recordChallengeValidation(verdict: string, issuesParsed: number, counts: SeverityCounts): ValidationEntry {
    const entry: ValidationEntry = {
      step: 'validate-challenge',
      timestamp: this.timestamp(),
      rules_version: RULES_VERSION,
      mode: 'normal',
      result: { valid: true, ...counts, verdict, issues_parsed: issuesParsed },
      errors: [],
      warnings: [],
    };
    this.record.validations.push(entry);
    this.dirty = true;
    return structuredClone(entry);
  }

  lastValidation(step: string): ValidationEntry | undefined {
    for (let i = this.record.validations.length - 1; i >= 0; i--) {
      if (this.record.validations[i].step === step) return structuredClone(this.record.validations[i]);
    }
    return undefined;
  }

  clearValidations(): void {
    this.record.validations = [];
    this.dirty = true;
  }

  // ==========================================================================
  // TELEMETRY
  // ==========================================================================

  recordLlmCall(input: LlmCallInput): LlmCall {
    const cost = input.pricing
      ? ((input.tokensIn ?? 0) / 1_000_000) * input.pricing.input +
        ((input.tokensOut ?? 0) / 1_000_000) * input.pricing.output
      : undefined;

    const call: LlmCall = {
      step: input.step,
      model: input.model,
      tokens_in: input.tokensIn,
      tokens_out: input.tokensOut,
      cost_usd: cost,
      duration_ms: input.durationMs,
      timestamp: this.timestamp(),
    };

    const telemetry = (this.record.telemetry ??= {
      calls: [],
      total_tokens_in: 0,
      total_tokens_out: 0,
      total_cost_usd: 0,
      total_duration_ms: 0,
    });
    telemetry.calls.push(call);
    telemetry.total_tokens_in += input.tokensIn ?? 0;
    telemetry.total_tokens_out += input.tokensOut ?? 0;
    telemetry.total_cost_usd += cost ?? 0;
    telemetry.total_duration_ms += input.durationMs ?? 0;

    this.dirty = true;
    return structuredClone(call);
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
