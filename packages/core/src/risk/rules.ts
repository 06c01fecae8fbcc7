/**
 * Plainsh Core — Risk Rule Table
 *
 * Rules are data: a matcher, the tier it assigns, and the reason shown to
 * the operator. The classifier evaluates every rule uniformly; adding a rule
 * never touches control flow.
 *
 * Registration order is CRITICAL down to LOW. Trigger output follows this
 * order, so reordering rules changes what the operator sees first.
 */

import { RiskTier } from '../types/risk.js';

// ---------------------------------------------------------------------------
// Rule shape
// ---------------------------------------------------------------------------

/**
 * How a rule recognises a command.
 *
 * - `pattern`: case-insensitive regex over the normalized command
 * - `executable`: the program a simple command runs (after `sudo`, `env`, …)
 * - `cwd`: the working directory starts with one of the prefixes
 * - `all`: every inner matcher must match
 */
export type RuleMatcher =
  | { readonly kind: 'pattern'; readonly pattern: RegExp }
  | { readonly kind: 'executable'; readonly names: ReadonlyArray<string> }
  | { readonly kind: 'cwd'; readonly prefixes: ReadonlyArray<string> }
  | { readonly kind: 'all'; readonly matchers: ReadonlyArray<RuleMatcher> };

export interface RiskRule {
  /** Pattern name reported in triggers. Unique within a table. */
  readonly id: string;
  readonly tier: RiskTier;
  readonly reason: string;
  readonly match: RuleMatcher;
}

const pattern = (source: string): RuleMatcher => ({ kind: 'pattern', pattern: new RegExp(source, 'i') });
const executable = (...names: string[]): RuleMatcher => ({ kind: 'executable', names });

/** Flags of an `rm` invocation, at least one of them recursive. */
const RM_RECURSIVE = String.raw`\brm\s+(?:-[a-z-]*\s+)*(?:-[a-z]*r[a-z]*|--recursive)\s+(?:-[a-z-]*\s+)*`;

/** Block devices that hold filesystems. */
const BLOCK_DEVICE = String.raw`\/dev\/(?:sd[a-z]|hd[a-z]|vd[a-z]|xvd[a-z]|nvme\d|mmcblk\d|disk\d)`;

// ---------------------------------------------------------------------------
// Default rules
// ---------------------------------------------------------------------------

export const DEFAULT_RULES: ReadonlyArray<RiskRule> = [
  // CRITICAL — irreversible system damage
  {
    id: 'recursive-delete+root-path',
    tier: RiskTier.Critical,
    reason: 'Recursive deletion of the root filesystem or a top-level system directory',
    match: pattern(
      RM_RECURSIVE +
        String.raw`(?:\/\*|\/|~\/?|\$HOME\/?|\/(?:bin|boot|dev|etc|home|lib|lib64|opt|proc|root|sbin|srv|sys|usr|var)\/?)(?=[\s;&|]|$)`,
    ),
  },
  {
    id: 'recursive-delete+wildcard',
    tier: RiskTier.Critical,
    reason: 'Recursive deletion of everything matched by a bare wildcard',
    match: pattern(RM_RECURSIVE + String.raw`\*(?=[\s;&|]|$)`),
  },
  {
    id: 'fork-bomb',
    tier: RiskTier.Critical,
    reason: 'Fork bomb',
    match: pattern(String.raw`:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:`),
  },
  {
    id: 'disk-overwrite',
    tier: RiskTier.Critical,
    reason: 'Writes raw data over a block device',
    match: pattern(String.raw`\bdd\b[^;&|]*\bof=` + BLOCK_DEVICE),
  },
  {
    id: 'filesystem-format',
    tier: RiskTier.Critical,
    reason: 'Formats a block device',
    match: pattern(String.raw`\bmkfs(?:\.\w+)?\s+(?:-\S+\s+)*\/dev\/`),
  },
  {
    id: 'device-redirect',
    tier: RiskTier.Critical,
    reason: 'Redirects output into a block device',
    match: pattern(String.raw`>\s*` + BLOCK_DEVICE),
  },
  {
    id: 'system-file-overwrite',
    tier: RiskTier.Critical,
    reason: 'Overwrites an account or privilege database',
    match: pattern(String.raw`>\s*\/etc\/(?:passwd|shadow|sudoers|group)\b`),
  },

  // HIGH — significant system impact
  {
    id: 'privilege-escalation+destructive-verb',
    tier: RiskTier.High,
    reason: 'Destructive command run with elevated privileges',
    match: {
      kind: 'all',
      matchers: [
        pattern(String.raw`\b(?:sudo|doas)\b`),
        executable('rm', 'dd', 'mkfs', 'shred', 'wipefs', 'fdisk', 'parted', 'chmod', 'chown', 'mv'),
      ],
    },
  },
  {
    id: 'recursive-permission+root-path',
    tier: RiskTier.High,
    reason: 'Recursively changes permissions from the filesystem root',
    match: pattern(String.raw`\bchmod\s+(?:-\S+\s+)*-[a-z]*r[a-z]*\s+\S+\s+\/(?=\s|$)`),
  },
  {
    id: 'recursive-ownership+system-path',
    tier: RiskTier.High,
    reason: 'Recursively changes ownership of system directories',
    match: pattern(String.raw`\bchown\s+(?:-\S+\s+)*-[a-z]*r[a-z]*\s+\S+\s+\/(?:bin|boot|etc|lib|sbin|usr|var)?(?=[\s/]|$)`),
  },
  {
    id: 'kill-init',
    tier: RiskTier.High,
    reason: 'Kills the init process',
    match: pattern(String.raw`\b(?:killall\s+-9\s+(?:init|systemd)\b|kill\s+-9\s+1(?=\s|$))`),
  },
  {
    id: 'forced-shutdown',
    tier: RiskTier.High,
    reason: 'Forced shutdown or reboot',
    match: pattern(String.raw`\b(?:reboot|shutdown|halt|poweroff)\s+(?:\S+\s+)*(?:-f|--force)\b`),
  },
  {
    id: 'firewall-flush',
    tier: RiskTier.High,
    reason: 'Flushes firewall rules',
    match: pattern(String.raw`\biptables\s+(?:-F|--flush)\b`),
  },
  {
    id: 'history-wipe',
    tier: RiskTier.High,
    reason: 'Clears shell history',
    match: pattern(String.raw`\bhistory\s+-c\b`),
  },
  {
    id: 'secure-delete',
    tier: RiskTier.High,
    reason: 'Irrecoverably shreds files',
    match: executable('shred', 'wipefs'),
  },
  {
    id: 'pipe-to-shell',
    tier: RiskTier.High,
    reason: 'Pipes output into a shell interpreter',
    match: pattern(String.raw`\|\s*(?:sudo\s+)?(?:bash|sh|zsh|fish)\b`),
  },

  // MEDIUM — possible data loss or security exposure
  {
    id: 'recursive-delete',
    tier: RiskTier.Medium,
    reason: 'Recursive deletion',
    match: pattern(String.raw`\brm\s+(?:-[a-z-]*\s+)*(?:-[a-z]*r[a-z]*|--recursive)\b`),
  },
  {
    id: 'move-to-null',
    tier: RiskTier.Medium,
    reason: 'Moves files to the null device',
    match: pattern(String.raw`\bmv\s+.*\s\/dev\/null\b`),
  },
  {
    id: 'system-config-redirect',
    tier: RiskTier.Medium,
    reason: 'Redirects output into a system directory',
    match: pattern(String.raw`>\s*\/(?:etc|usr|var)\/`),
  },
  {
    id: 'find-delete',
    tier: RiskTier.Medium,
    reason: 'Finds and deletes files',
    match: pattern(String.raw`\bfind\b.*(?:-exec\s+rm\b|-delete\b)`),
  },
  {
    id: 'archive-overwrite',
    tier: RiskTier.Medium,
    reason: 'Overwrites files while extracting an archive',
    match: pattern(String.raw`\btar\b.*--overwrite\b`),
  },
  {
    id: 'remote-script-exec',
    tier: RiskTier.Medium,
    reason: 'Downloads and executes a remote script',
    match: pattern(String.raw`\b(?:curl|wget)\b[^|]*\|\s*(?:sudo\s+)?(?:bash|sh|zsh)\b`),
  },
  {
    id: 'destructive-wildcard',
    tier: RiskTier.Medium,
    reason: 'Wildcard in a destructive command',
    match: pattern(String.raw`\b(?:rm|chmod|chown)\s+[^;&|]*\*`),
  },
  {
    id: 'script-permission-change',
    tier: RiskTier.Medium,
    reason: 'Changes permissions of a script',
    match: pattern(String.raw`\bchmod\s+[0-7]{3,4}\s+\S+\.(?:sh|py|pl|rb)\b`),
  },
  {
    id: 'system-tool',
    tier: RiskTier.Medium,
    reason: 'Uses a system administration tool',
    match: executable(
      'fdisk', 'parted', 'gparted', 'mkfs', 'fsck', 'mount', 'umount',
      'iptables', 'ufw', 'firewall-cmd', 'systemctl', 'service',
    ),
  },
  {
    id: 'protected-cwd',
    tier: RiskTier.Medium,
    reason: 'Runs inside a protected system directory',
    match: { kind: 'cwd', prefixes: ['/boot', '/etc', '/usr', '/var', '/sys', '/proc'] },
  },

  // LOW — potentially risky
  {
    id: 'file-delete',
    tier: RiskTier.Low,
    reason: 'Deletes files',
    match: pattern(String.raw`\brm\s+[^-\s]`),
  },
  {
    id: 'config-file-change',
    tier: RiskTier.Low,
    reason: 'Copies or moves configuration files',
    match: pattern(String.raw`\b(?:cp|mv)\s+.*\.(?:conf|cfg|ini)\b`),
  },
  {
    id: 'system-config-edit',
    tier: RiskTier.Low,
    reason: 'Edits system configuration',
    match: pattern(String.raw`\b(?:nano|vi|vim|emacs)\s+\/etc\/`),
  },
  {
    id: 'make-executable',
    tier: RiskTier.Low,
    reason: 'Makes files executable',
    match: pattern(String.raw`\bchmod\s+(?:\S+\s+)*\+x\b`),
  },
  {
    id: 'privileged',
    tier: RiskTier.Low,
    reason: 'Runs with elevated privileges',
    match: pattern(String.raw`\b(?:sudo|doas)\s+\S`),
  },
];
