// engine/requirements/extractor.ts — Parse requirement directives from a build script header
//
// Only the leading contiguous block of single-line comments is scanned:
//
//   #!/usr/bin/env node
//   // ::requirements kraken-std@^0.4 "left-pad@>=1.3 <2" --registry https://npm.example.org
//   // ::requirements tooling@./build-support/tooling
//   // ::searchpath build-support
//
// The block ends at the first line that is not a `//` or `#` comment
// (blank lines included). Directive lines are tokenized with shell quoting
// rules; shell operators, globs and unterminated quotes are rejected.

import { parse as parseShell } from 'shell-quote';
import { z } from 'zod';
import { parseRequirement } from './requirement.js';
import { RequirementSpec } from './spec.js';
import type { Requirement, RequirementDiagnostic } from '../types.js';

export interface ExtractionResult {
  /** null whenever at least one diagnostic was produced. */
  spec: RequirementSpec | null;
  diagnostics: RequirementDiagnostic[];
}

type Tokenized = { ok: true; tokens: string[] } | { ok: false; message: string };

const DIRECTIVE = /^::([a-z][a-z-]*)(?:\s+(.*))?$/;
const RegistryUrl = z.string().url();

// ─── Tokenizing ──────────────────────────────────────────────────────────────

/**
 * Returns the quote character left open at end of input, or null. An
 * unquoted `#` at the start of a word begins a comment, which is not scanned.
 */
export function findUnterminatedQuote(text: string): string | null {
  let open: string | null = null;
  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (open === "'") {
      if (ch === "'") open = null;
    } else if (ch === '\\') {
      i++;
    } else if (open === '"') {
      if (ch === '"') open = null;
    } else if (ch === '"' || ch === "'") {
      open = ch;
    } else if (ch === '#' && (i === 0 || /\s/.test(text[i - 1]))) {
      break;
    }
  }
  return open;
}

function tokenize(args: string): Tokenized {
  const quote = findUnterminatedQuote(args);
  if (quote !== null) {
    return { ok: false, message: `unterminated ${quote === '"' ? 'double' : 'single'} quote` };
  }

  // Keep `$NAME` literal instead of expanding it from the environment.
  const entries = parseShell(args, (key) => `$${key}`);
  const tokens: string[] = [];
  for (const entry of entries) {
    if (typeof entry === 'string') {
      tokens.push(entry);
    } else if ('comment' in entry) {
      break;
    } else if (entry.op === 'glob') {
      return { ok: false, message: `unexpected glob "${entry.pattern}" (quote it)` };
    } else {
      return { ok: false, message: `unexpected shell operator "${entry.op}" (quote it)` };
    }
  }
  return { ok: true, tokens };
}

// ─── Directive Handlers ──────────────────────────────────────────────────────

interface Accumulator {
  requirements: Requirement[];
  registry: string | null;
  searchPaths: string[];
}

/** Returns an error message, or null when the tokens were accepted. */
function applyRequirements(tokens: string[], acc: Accumulator): string | null {
  const requirements: Requirement[] = [];
  let registry = acc.registry;

  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];

    if (token.startsWith('-')) {
      const eq = token.indexOf('=');
      const name = eq === -1 ? token : token.slice(0, eq);
      if (name !== '--registry') return `unknown installer flag "${name}"`;
      const value: string | undefined = eq === -1 ? tokens[++i] : token.slice(eq + 1);
      if (value === undefined || value === '') return '--registry requires a URL';
      if (!RegistryUrl.safeParse(value).success) return `invalid registry URL "${value}"`;
      registry = value;
      continue;
    }

    const requirement = parseRequirement(token);
    if (!requirement) return `invalid requirement "${token}"`;
    requirements.push(requirement);
  }

  acc.requirements.push(...requirements);
  acc.registry = registry;
  return null;
}

function applySearchPaths(tokens: string[], acc: Accumulator): string | null {
  for (const token of tokens) {
    if (token.startsWith('/')) return `search path "${token}" must be relative to the project directory`;
  }
  acc.searchPaths.push(...tokens);
  return null;
}

const HANDLERS: Record<string, (tokens: string[], acc: Accumulator) => string | null> = {
  requirements: applyRequirements,
  searchpath: applySearchPaths,
};

// ─── Extraction ──────────────────────────────────────────────────────────────

function commentBody(line: string): string | null {
  const trimmed = line.trim();
  if (trimmed.startsWith('//')) return trimmed.slice(2).trim();
  if (trimmed.startsWith('#')) return trimmed.slice(1).trim();
  return null;
}

/**
 * Extract the requirement spec from the header of `text`. Malformed
 * directives are reported as diagnostics, never thrown.
 *
 * @param source - file name used in diagnostics
 */
export function extractRequirements(text: string, source: string): ExtractionResult {
  const acc: Accumulator = { requirements: [], registry: null, searchPaths: [] };
  const diagnostics: RequirementDiagnostic[] = [];
  const lines = text.split(/\r?\n/);

  for (let i = 0; i < lines.length; i++) {
    const line = lines[i];
    if (i === 0 && line.startsWith('#!')) continue;

    const body = commentBody(line);
    if (body === null) break;

    const match = DIRECTIVE.exec(body);
    if (!match) continue;

    const handler = HANDLERS[match[1]];
    if (!handler) continue;

    const report = (message: string): void => {
      diagnostics.push({ code: 'MALFORMED_REQUIREMENT_SPEC', message, source, line: i + 1, text: line.trim() });
    };

    const tokenized = tokenize(match[2] ?? '');
    if (!tokenized.ok) {
      report(tokenized.message);
      continue;
    }
    const error = handler(tokenized.tokens, acc);
    if (error !== null) report(error);
  }

  if (diagnostics.length > 0) {
    return { spec: null, diagnostics };
  }
  return { spec: new RequirementSpec(acc), diagnostics };
}
