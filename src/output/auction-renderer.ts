import chalk from 'chalk';
import type { AuctionListResult, FormattedAuction, LetterGrade, MetricGrade } from '../core/types.js';
import { formatFixed, padRight } from './format-utils.js';

/**
 * Renders an auction list as a terminal table.
 * Bills show the high discount rate in the rate column; coupons show the high yield.
 */

const COLUMNS: Array<[string, number]> = [
  ['Date', 12],
  ['Type', 6],
  ['Term', 12],
  ['CUSIP', 11],
  ['Rate', 8],
  ['BTC', 6],
  ['Tail', 7],
  ['Dealer', 8],
  ['Indirect', 10],
  ['Grade', 5],
];

export function renderAuctionTable(result: AuctionListResult): string {
  const lines: string[] = [];

  const header = `Treasury Auctions: ${result.period} (${result.count} settled)`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');

  if (result.auctions.length === 0) {
    lines.push(chalk.dim('  No settled auctions in this period.'));
  } else {
    lines.push('  ' + COLUMNS.map(([name, width]) => chalk.underline(padRight(name, width))).join(''));
    for (const a of result.auctions) {
      const cells = auctionCells(a);
      lines.push('  ' + cells.map((cell, i) => padRight(cell, COLUMNS[i][1])).join(''));
    }
  }

  lines.push('');

  if (result.graded_summary) {
    const dist = Object.entries(result.graded_summary.grade_distribution)
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([g, n]) => `${g}:${n}`)
      .join(' ');
    lines.push(`  Graded: ${chalk.bold(String(result.graded_summary.count))}  ${dist}`);
  }
  if (result.bill_count !== undefined) {
    lines.push(`  Bills:  ${result.bill_count}`);
  }
  if (result.wi_source) {
    lines.push(chalk.dim(`  WI proxy: ${result.wi_source}`));
  }

  for (const w of result._warnings ?? []) {
    lines.push(chalk.yellow(`  Warning: ${w}`));
  }

  return lines.join('\n');
}

function auctionCells(a: FormattedAuction): string[] {
  const rate = a.kind === 'bill' ? a.high_discnt_rate : a.high_yield;
  const tail = a.kind === 'graded' ? formatFixed(a.tail_bps, 1) : '--';
  const grade = a.kind === 'graded' ? colorGrade(a.grade.composite_grade) : '--';
  const type = a.kind === 'bill' && a.is_cmb ? 'CMB' : a.security_type;

  return [
    a.auction_date ?? '--',
    type,
    a.security_term ?? '--',
    a.cusip ?? '--',
    formatFixed(rate, 3, '%'),
    formatFixed(a.bid_to_cover, 2),
    tail,
    formatFixed(a.dealer_pct, 1, '%'),
    formatFixed(a.indirect_pct, 1, '%'),
    grade,
  ];
}

export function colorGrade(grade: MetricGrade | LetterGrade): string {
  switch (grade) {
    case 'A':
      return chalk.green(grade);
    case 'B':
      return chalk.cyan(grade);
    case 'C':
      return chalk.yellow(grade);
    case 'D':
    case 'F':
      return chalk.red(grade);
    default:
      return chalk.dim(grade);
  }
}
