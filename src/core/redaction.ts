/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Masking rule for one secret shape
 */
export interface RedactionRule {
  name: string;
  regex: RegExp;
  replacement: string;
}

/**
 * Applied in order. Assignment and header rules keep the name and separator
 * and replace only the value; shape rules replace the whole match.
 * Every replacement is a fixed point of the rule list, so redacting twice
 * changes nothing.
 */
export const REDACTION_RULES: RedactionRule[] = [
  {
    name: 'Authorization Header',
    regex: /\b(Authorization)\b(\s*[:=]\s*)Bearer\s+[A-Za-z0-9\-._~+/]+=*/gi,
    replacement: '$1$2Bearer <REDACTED>',
  },
  {
    name: 'Secret Assignment',
    regex: /\b([A-Z0-9_]*(?:API[_-]?KEY|TOKEN|SECRET|PASSWORD|PASSWD)[A-Z0-9_]*)\b(\s*[:=]\s*)([^\s"']+|"[^"]*"|'[^']*')/gi,
    replacement: '$1$2<REDACTED>',
  },
  {
    name: 'Bearer Token',
    regex: /\b(Bearer)\s+[A-Za-z0-9\-._~+/]+=*/gi,
    replacement: '$1 <REDACTED>',
  },
  {
    name: 'Anthropic Key',
    regex: /\bsk-ant-[A-Za-z0-9_-]{20,}/g,
    replacement: '<REDACTED_ANTHROPIC_KEY>',
  },
  {
    name: 'OpenAI Project Key',
    regex: /\bsk-proj-[A-Za-z0-9_-]{20,}/g,
    replacement: '<REDACTED_OPENAI_KEY>',
  },
  {
    name: 'OpenAI Key',
    regex: /\bsk-[A-Za-z0-9]{12,}\b/g,
    replacement: '<REDACTED_OPENAI_KEY>',
  },
  {
    name: 'GitHub Token',
    regex: /\bgh[pousr]_[A-Za-z0-9]{36}\b/g,
    replacement: '<REDACTED_GITHUB_TOKEN>',
  },
  {
    name: 'JWT Token',
    regex: /\beyJ[A-Za-z0-9_-]{10,}\.[A-Za-z0-9._-]+\.[A-Za-z0-9._-]+\b/g,
    replacement: '<REDACTED_JWT>',
  },
  {
    name: 'AWS Access Key',
    regex: /\bAKIA[0-9A-Z]{16}\b/g,
    replacement: '<REDACTED_AWS_ACCESS_KEY_ID>',
  },
  {
    name: 'Database URL',
    regex: /\b(postgres|postgresql|mysql|mongodb|redis):\/\/([^:/\s@]+):[^@\s]+@/g,
    replacement: '$1://$2:<REDACTED>@',
  },
];

export function redactSensitiveText(text: string): string {
  if (!text) {
    return text;
  }
  return REDACTION_RULES.reduce((acc, rule) => acc.replace(rule.regex, rule.replacement), text);
}

/**
 * Deep redaction for log payloads: strings are masked, arrays and plain
 * objects are walked, everything else passes through.
 */
export function redactValue(value: unknown): unknown {
  if (typeof value === 'string') {
    return redactSensitiveText(value);
  }
  if (Array.isArray(value)) {
    return value.map((item) => redactValue(item));
  }
  if (value !== null && typeof value === 'object') {
    const entries = Object.entries(value).map(([key, item]) => [key, redactValue(item)] as const);
    return Object.fromEntries(entries);
  }
  return value;
}
