/**
 * Markdown formatters.
 *
 * Produce clean Markdown for `--format markdown` and for reports written
 * with `kasiski --output`.
 */

import type {
  CrackResult,
  FrequencyResult,
  KasiskiReport,
} from '../types/index.js';

/**
 * Format a Kasiski report as a Markdown document.
 */
export function formatKasiskiMarkdown(report: KasiskiReport): string {
  const lines: string[] = [];

  lines.push('# Kasiski Examination');
  lines.push('');
  lines.push(`**Ciphertext Length:** ${report.ciphertextLength}  `);
  lines.push(
    `**Pattern Lengths:** ${report.minPatternLength}-${report.maxPatternLength}`,
  );
  lines.push('');
  lines.push('---');
  lines.push('');

  // ── Patterns table ──────────────────────────────────────────────────────
  lines.push('## Repeated Patterns');
  lines.push('');

  if (report.patterns.length === 0) {
    lines.push('_No repeated patterns found._');
  } else {
    lines.push('| Pattern | Period | Positions |');
    lines.push('|---------|--------|-----------|');
    for (const entry of report.patterns) {
      const period = entry.period === null ? 'mixed' : String(entry.period);
      lines.push(
        `| \`${escapeMarkdown(entry.pattern)}\` | ${period} | ${entry.indices.join(', ')} |`,
      );
    }
  }

  lines.push('');
  lines.push('## Candidate Key Lengths');
  lines.push('');
  lines.push(`- **Periods:** ${report.periods.join(', ')}`);
  lines.push(`- **Key Lengths:** ${report.keyLengths.join(', ')}`);
  lines.push('');

  return lines.join('\n');
}

/** Format ranked key candidates as a Markdown document. */
export function formatCrackMarkdown(result: CrackResult): string {
  const lines: string[] = [];

  lines.push('# Vigenère Key Recovery');
  lines.push('');
  lines.push(`**Ciphertext Length:** ${result.ciphertextLength}  `);
  lines.push(`**Kasiski Key Lengths:** ${result.keyLengths.join(', ')}`);
  lines.push('');
  lines.push('---');
  lines.push('');

  if (result.candidates.length === 0) {
    lines.push('_No key lengths within the requested bounds._');
    lines.push('');
    return lines.join('\n');
  }

  lines.push('| Rank | Key | Length | Chi² |');
  lines.push('|------|-----|--------|------|');
  result.candidates.forEach((c, i) => {
    lines.push(`| ${i + 1} | \`${c.key}\` | ${c.keyLength} | ${c.score.toFixed(2)} |`);
  });

  const best = result.candidates[0];
  lines.push('');
  lines.push(`## Best Decryption (\`${best.key}\`)`);
  lines.push('');
  lines.push('```');
  lines.push(best.plaintext);
  lines.push('```');
  lines.push('');

  return lines.join('\n');
}

/** Format letter and n-graph frequencies as a Markdown document. */
export function formatFrequencyMarkdown(result: FrequencyResult): string {
  const lines: string[] = [];

  lines.push('# Letter Frequency');
  lines.push('');
  lines.push(`**Letters:** ${result.totalLetters}`);
  lines.push('');
  lines.push('| Letter | Count | Guess |');
  lines.push('|--------|-------|-------|');
  for (const [letter, count] of result.ranked) {
    if (count === 0) break;
    lines.push(`| ${letter} | ${count} | ${result.substitution[letter]} |`);
  }

  if (result.ngrams.length > 0) {
    lines.push('');
    lines.push(`## Repeated ${result.ngramSize}-graphs`);
    lines.push('');
    for (const [ngram, count] of result.ngrams) {
      lines.push(`- \`${escapeMarkdown(ngram)}\` (${count})`);
    }
  }

  lines.push('');
  lines.push('## Naive Substitution');
  lines.push('');
  lines.push('```');
  lines.push(result.guess);
  lines.push('```');
  lines.push('');

  return lines.join('\n');
}

// ── Helpers ─────────────────────────────────────────────────────────────────

function escapeMarkdown(s: string): string {
  return s.replace(/\|/g, '\\|').replace(/`/g, '\\`').replace(/\n/g, ' ');
}
