import chalk from 'chalk';
import type { AuctionAnalysisResult, DemandSignal, MaturityBreakdown, TrendLabel } from '../core/types.js';
import { formatFixed, padRight } from './format-utils.js';
import { colorGrade } from './auction-renderer.js';

/**
 * Renders a demand analysis: overall signal, per-maturity GPA and trends,
 * bill summary and warnings.
 */

export function renderAnalysisTable(result: AuctionAnalysisResult): string {
  const lines: string[] = [];

  const header = `Treasury Auction Demand: ${result.period}`;
  lines.push(chalk.bold(header));
  lines.push(chalk.dim('='.repeat(header.length)));
  lines.push('');
  lines.push(`  Demand signal:  ${colorSignal(result.demand_signal)}`);
  lines.push(`  Auctions:       ${result.total_auctions}`);

  const nb = result.notes_bonds;
  if (nb) {
    lines.push(`  Notes/bonds:    ${nb.count} (avg GPA ${nb.avg_gpa.toFixed(2)})`);
    lines.push('');
    lines.push(
      '  ' +
        chalk.underline(padRight('Term', 12)) +
        chalk.underline(padRight('Count', 7)) +
        chalk.underline(padRight('GPA', 6)) +
        chalk.underline(padRight('Latest', 8)) +
        chalk.underline(padRight('Date', 12)) +
        chalk.underline(padRight('Trend', 19)) +
        chalk.underline(padRight('Tail/BTC/Dlr/Ind', 18))
    );
    for (const m of nb.by_maturity) {
      lines.push(
        '  ' +
          padRight(m.term, 12) +
          padRight(String(m.auction_count), 7) +
          padRight(m.avg_gpa.toFixed(2), 6) +
          padRight(colorGrade(m.latest_grade), 8) +
          padRight(m.latest_date ?? '--', 12) +
          padRight(m.trends.overall, 19) +
          trendArrows(m)
      );
    }
  }

  if (result.bills) {
    lines.push('');
    lines.push(
      `  Bills:          ${result.bills.count} (avg BTC ${formatFixed(result.bills.avg_bid_to_cover, 2)}, ` +
        `${result.bills.cmb_count} CMB)`
    );
  }

  if (result._warnings?.length) {
    lines.push('');
    for (const w of result._warnings) {
      lines.push(chalk.yellow(`  Warning: ${w}`));
    }
  }

  return lines.join('\n');
}

export function trendArrow(label: TrendLabel): string {
  switch (label) {
    case 'improving':
      return chalk.green('↑');
    case 'deteriorating':
      return chalk.red('↓');
    case 'stable':
      return '→';
    default:
      return chalk.dim('·');
  }
}

function trendArrows(m: MaturityBreakdown): string {
  const t = m.trends;
  if (!('tail_bps' in t)) return chalk.dim('n/a');
  return [t.tail_bps, t.bid_to_cover, t.dealer_pct, t.indirect_pct].map(trendArrow).join(' ');
}

function colorSignal(signal: DemandSignal): string {
  switch (signal) {
    case 'strong':
      return chalk.green.bold(signal);
    case 'healthy':
      return chalk.green(signal);
    case 'soft':
      return chalk.yellow(signal);
    case 'weak':
      return chalk.red(signal);
    default:
      return chalk.dim(signal);
  }
}
