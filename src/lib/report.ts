import type { ComparisonResult, SeasonAverages } from '../types/stats';

export interface ReportColors {
  heading(text: string): string;
  positive(text: string): string;
  negative(text: string): string;
  muted(text: string): string;
}

const plainColors: ReportColors = {
  heading: text => text,
  positive: text => text,
  negative: text => text,
  muted: text => text,
};

const AVERAGE_COLUMNS: Array<keyof SeasonAverages> = [
  'games_played',
  'min',
  'pts',
  'reb',
  'ast',
  'stl',
  'blk',
  'turnover',
  'fg_pct',
  'fg3_pct',
  'ft_pct',
];

function formatAverage(column: keyof SeasonAverages, value: number): string {
  if (column === 'games_played') {
    return String(value);
  }
  return column.endsWith('_pct') ? value.toFixed(3) : value.toFixed(1);
}

function formatGrowth(value: number | null, colors: ReportColors): string {
  if (value === null) {
    return colors.muted('n/a');
  }
  if (value > 0) {
    return colors.positive(`+${value.toFixed(1)}%`);
  }
  if (value < 0) {
    return colors.negative(`${value.toFixed(1)}%`);
  }
  return '0.0%';
}

/**
 * Render a season comparison as console lines
 */
export function formatComparisonReport(
  result: ComparisonResult,
  colors: ReportColors = plainColors
): string[] {
  const lines: string[] = [];
  const team = result.player.team ?? 'No team';

  lines.push(colors.heading(`${result.player.name} (${team})`));
  lines.push('');
  lines.push(colors.heading('Season averages'));

  for (const season of result.seasons) {
    const averages = result.season_averages[String(season)];
    if (!averages) {
      lines.push(`  ${season}: ${colors.muted('no data')}`);
      continue;
    }
    const cells = AVERAGE_COLUMNS.map(column => `${column}=${formatAverage(column, averages[column])}`);
    lines.push(`  ${season}: ${cells.join(' ')}`);
  }

  const growthKeys = Object.keys(result.growth);
  if (growthKeys.length > 0) {
    lines.push('');
    lines.push(colors.heading('Growth'));
    for (const key of growthKeys) {
      const entry = result.growth[key];
      const cells = result.metrics.map(metric => `${metric} ${formatGrowth(entry[metric] ?? null, colors)}`);
      lines.push(`  ${key}: ${cells.join(', ')}`);
    }
  }

  return lines;
}
