/**
 * Report Renderer
 *
 * Markdown views over engine output: one report per app, a risk-ranked
 * leaderboard for the whole run, and the niche comparison with safe-harbor
 * verdicts. Pure presentation; nothing here computes a score.
 */

import type { AppAnalysis, NarrativeBrief, NicheMatrix, SafeHarborVerdict } from '../types';

export function renderAppReport(analysis: AppAnalysis, narrative?: NarrativeBrief): string {
  const { metrics, pillarDensities, signals, revenueLeakage } = analysis;
  const lines: string[] = [
    `# ${analysis.appName} - Volatility Report`,
    '',
    `_Analysis date: ${analysis.analysisDate}_`,
    '',
  ];

  if (narrative) {
    lines.push(`> **${narrative.headline}**`, '');
    if (narrative.summary) {
      lines.push(narrative.summary, '');
    }
  }

  lines.push(
    '## Metrics',
    '',
    '| Metric | Value |',
    '|---|---|',
    `| Reviews analyzed | ${metrics.totalReviews} |`,
    `| Pain reviews | ${metrics.painReviews} (${percent(metrics.negativeRatio)}) |`,
    `| Risk score | ${metrics.riskScore} (${metrics.riskBand}) |`,
    `| Volatility slope | ${metrics.volatilitySlope} |`,
    `| Slope delta | ${metrics.slopeDelta} |`,
    `| Momentum | ${metrics.momentum} |`,
    `| Primary pillar | ${analysis.primaryPillar} |`,
    '',
    analysis.volatility.insight,
    '',
    '## Pillar Densities',
    '',
    `- Functional: ${pillarDensities.functional.toFixed(4)}`,
    `- Economic: ${pillarDensities.economic.toFixed(4)}`,
    `- Experience: ${pillarDensities.experience.toFixed(4)}`,
    ''
  );

  if (signals.brokenUpdateDetected && signals.suspectedVersion) {
    lines.push(`**Broken update suspected:** version ${signals.suspectedVersion}`, '');
  }

  if (signals.topPainCategories.length > 0) {
    lines.push('## Top Pain Categories', '', '| Category | Pillar | Reviews | Weight |', '|---|---|---|---|');
    for (const category of signals.topPainCategories) {
      lines.push(`| ${category.category} | ${category.pillar} | ${category.count} | ${category.weight} |`);
    }
    lines.push('');
  }

  const anomalies = analysis.timeline.filter((week) => week.isAnomaly);
  if (anomalies.length > 0) {
    lines.push('## Timeline Events', '');
    for (const week of anomalies) {
      lines.push(`- **${week.weekLabel}**: ${week.namedLabel ?? 'Critical Spike'} (density ${week.density.toFixed(2)})`);
    }
    lines.push('');
  }

  if (analysis.clusters.length > 0) {
    lines.push('## Emerging Phrases', '');
    for (const cluster of analysis.clusters) {
      lines.push(`- "${cluster.phrase}" (${cluster.count})`);
    }
    lines.push('');
  }

  if (analysis.migration.length > 0) {
    lines.push('## Competitor Migration', '');
    for (const event of analysis.migration) {
      lines.push(`- ${event.competitorName}: ${event.count} ${event.type}`);
    }
    lines.push('');
  }

  lines.push(
    '## Revenue Leakage',
    '',
    `${revenueLeakage.churnReviewCount} weighted churn reviews x ${revenueLeakage.multiplier} (${revenueLeakage.nicheCategory}) x ${usd(revenueLeakage.avgPrice)} = **${usd(revenueLeakage.monthlyUsd)}/month**`,
    ''
  );

  if (analysis.evidence.length > 0) {
    lines.push('## Evidence', '');
    for (const item of analysis.evidence) {
      const tag = item.isWhale ? ' [whale]' : '';
      lines.push(`- (${item.rating}★${tag}) "${item.text}"`);
    }
    lines.push('');
  }

  if (narrative && narrative.strategy.length > 0) {
    lines.push('## Strategy', '');
    narrative.strategy.forEach((step, i) => lines.push(`${i + 1}. ${step}`));
    lines.push('');
  }

  return lines.join('\n');
}

/**
 * Apps ranked by risk score, highest first; ties keep input order
 */
export function renderLeaderboard(analyses: AppAnalysis[]): string {
  const ranked = [...analyses].sort((a, b) => b.metrics.riskScore - a.metrics.riskScore);
  const lines = [
    '# Market Volatility Leaderboard',
    '',
    '| Rank | App | Risk | Band | Momentum | Primary Pillar | Leakage/mo |',
    '|---|---|---|---|---|---|---|',
  ];
  ranked.forEach((analysis, i) => {
    const { metrics } = analysis;
    lines.push(
      `| ${i + 1} | ${analysis.appName} | ${metrics.riskScore} | ${metrics.riskBand} | ${metrics.momentum} | ${analysis.primaryPillar} | ${usd(analysis.revenueLeakage.monthlyUsd)} |`
    );
  });
  return lines.join('\n') + '\n';
}

export function renderNicheReport(nicheName: string, matrix: NicheMatrix, verdicts: SafeHarborVerdict[]): string {
  const lines = [
    `# Niche Report: ${nicheName}`,
    '',
    '| App | Functional | Economic | Experience | Risk | Safe Harbor |',
    '|---|---|---|---|---|---|',
  ];
  for (const verdict of verdicts) {
    const scores = matrix[verdict.appName] ?? verdict.scores;
    lines.push(
      `| ${verdict.appName} | ${scores.Functional.toFixed(1)} | ${scores.Economic.toFixed(1)} | ${scores.Experience.toFixed(1)} | ${verdict.riskScore} | ${verdict.safeHarbor ? 'Yes' : 'No'} |`
    );
  }

  const harbors = verdicts.filter((verdict) => verdict.safeHarbor).map((verdict) => verdict.appName);
  lines.push('', harbors.length > 0 ? `Safe harbor: ${harbors.join(', ')}` : 'Safe harbor: none');
  return lines.join('\n') + '\n';
}

function percent(ratio: number): string {
  return `${(ratio * 100).toFixed(1)}%`;
}

function usd(amount: number): string {
  return `$${amount.toLocaleString('en-US', { minimumFractionDigits: 2, maximumFractionDigits: 2 })}`;
}
