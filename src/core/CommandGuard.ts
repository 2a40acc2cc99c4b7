/**
 * @license
 * Copyright 2025 Autohand AI LLC
 * SPDX-License-Identifier: Apache-2.0
 */
import type { CommandProposal, GuardVerdict, RuntimeSettings } from '../types.js';
import type { InteractionLogger } from './interactionLogger.js';

/**
 * Pattern for a high-risk command shape
 */
export interface DestructivePattern {
  regex: RegExp;
  reason: string;
}

/** Start of text or after a command separator */
const AT_COMMAND = String.raw`(^|[;&|]\s*)\s*`;

/**
 * Ordered rule set; the first match wins. Matching is a confirmation
 * trigger over free-form shell text, not a security boundary: quoting,
 * variables and aliases all evade it, and text such as `echo "rm -rf"`
 * is deliberately left alone because the rules anchor on command position.
 */
export const DESTRUCTIVE_COMMAND_PATTERNS: DestructivePattern[] = [
  {
    regex: new RegExp(`${AT_COMMAND}rm\\s+.*(--no-preserve-root|--preserve-root=0)\\b`, 'i'),
    reason: 'rm with preserve-root disabled',
  },
  {
    regex: new RegExp(
      `${AT_COMMAND}(sudo\\s+)?rm\\b(?=[^\\n]*(?:\\s|^)(?:-rf|-fr|--recursive|--force|-r|-f)(?:\\s|$))`,
      'i'
    ),
    reason: 'rm with recursive/force options',
  },
  { regex: new RegExp(`${AT_COMMAND}mkfs(\\.\\w+)?\\b`, 'i'), reason: 'filesystem format command' },
  { regex: new RegExp(`${AT_COMMAND}dd\\s+.*\\bof=/dev/`, 'i'), reason: 'dd write to block device' },
  { regex: new RegExp(`${AT_COMMAND}shred\\b`, 'i'), reason: 'secure delete command' },
  { regex: new RegExp(`${AT_COMMAND}wipefs\\b`, 'i'), reason: 'filesystem wipe command' },
  { regex: new RegExp(`${AT_COMMAND}git\\s+reset\\s+--hard\\b`, 'i'), reason: 'git hard reset' },
  { regex: new RegExp(`${AT_COMMAND}git\\s+clean\\s+-[^\\n]*f`, 'i'), reason: 'git clean with force' },
  { regex: new RegExp(`${AT_COMMAND}docker\\s+system\\s+prune\\b`, 'i'), reason: 'docker prune' },
  { regex: /:\(\)\s*\{\s*:\|:&\s*\};:/, reason: 'fork bomb pattern' },
];

export const BLOCKED_BY_SAFE_MODE = 'blocked_by_safe_mode';
export const EMPTY_AFTER_EDIT = 'safe_mode_empty_after_edit';

export type GuardAction = 'override' | 'edit' | 'skip';

/**
 * Operator choices the guard needs while a command is blocked
 */
export interface GuardPrompter {
  chooseGuardAction(reason: string, command: string): Promise<GuardAction>;
  editCommand(initial: string): Promise<string>;
}

export interface ScreenOutcome {
  /** The proposal that was finally judged (may carry edited text) */
  proposal: CommandProposal;
  verdict: GuardVerdict;
}

export class CommandGuard {
  constructor(
    private readonly settings: Pick<RuntimeSettings, 'safeMode'>,
    private readonly logger?: InteractionLogger,
    private readonly patterns: DestructivePattern[] = DESTRUCTIVE_COMMAND_PATTERNS
  ) {}

  classify(command: string): string | null {
    const normalized = command.trim();
    if (!normalized) {
      return null;
    }
    for (const pattern of this.patterns) {
      if (pattern.regex.test(normalized)) {
        return pattern.reason;
      }
    }
    return null;
  }

  /**
   * Fresh verdict for one command text. With safe mode off a match is
   * advisory: the command is allowed and the reason is kept for logging.
   */
  evaluate(command: string): GuardVerdict {
    const reason = this.classify(command);
    if (reason === null) {
      return { kind: 'allow' };
    }
    if (!this.settings.safeMode) {
      this.logger?.logEvent('safe_mode_advisory', { command, reason });
      return { kind: 'allow', reason };
    }
    return { kind: 'blockedPendingUser', reason };
  }

  /**
   * Run the confirmation gate for a proposal: allow it, or ask the operator
   * to override, edit (re-screened) or skip.
   */
  async screen(proposal: CommandProposal, prompter: GuardPrompter): Promise<ScreenOutcome> {
    let candidate = proposal;

    for (;;) {
      const verdict = this.evaluate(candidate.command);
      if (verdict.kind !== 'blockedPendingUser') {
        return { proposal: candidate, verdict };
      }

      this.logger?.logEvent('safe_mode_blocked_command', {
        command: candidate.command,
        reason: verdict.reason
      });

      const action = await prompter.chooseGuardAction(verdict.reason, candidate.command);

      if (action === 'override') {
        this.logger?.logEvent('safe_mode_override', {
          command: candidate.command,
          reason: verdict.reason
        });
        return { proposal: candidate, verdict: { kind: 'allow', reason: verdict.reason } };
      }

      if (action === 'edit') {
        const edited = (await prompter.editCommand(candidate.command)).trim();
        if (!edited) {
          return { proposal: candidate, verdict: { kind: 'blockedFinal', reason: EMPTY_AFTER_EDIT } };
        }
        candidate = { ...candidate, command: edited };
        continue;
      }

      return { proposal: candidate, verdict: { kind: 'blockedFinal', reason: BLOCKED_BY_SAFE_MODE } };
    }
  }
}
