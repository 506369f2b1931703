/**
 * Narrative Generator
 *
 * Turns a finished AppAnalysis into a short prose brief with Claude. It only
 * reads engine output; nothing it returns flows back into scoring. Without
 * an API key (or with NARRATIVE_ENABLED=false) a deterministic placeholder
 * built from the metrics is returned instead.
 */

import Anthropic from '@anthropic-ai/sdk';
import { z } from 'zod';
import type { AnthropicConfig } from '../config';
import { NarrativeError } from '../errors';
import type { AppAnalysis, NarrativeBrief } from '../types';

const briefSchema = z.object({
  headline: z.string().min(1),
  summary: z.string().default(''),
  personas: z
    .array(
      z.object({
        name: z.string(),
        archetype: z.string().default(''),
        story: z.string().default(''),
      })
    )
    .default([]),
  strategy: z.array(z.string()).default([]),
});

/**
 * Minimal completion contract, so tests can stand in for the Anthropic SDK
 */
export interface CompletionClient {
  complete(prompt: string): Promise<string>;
}

export class AnthropicCompletionClient implements CompletionClient {
  private anthropic: Anthropic;
  private model: string;

  constructor(apiKey: string, model: string) {
    this.anthropic = new Anthropic({ apiKey });
    this.model = model;
  }

  async complete(prompt: string): Promise<string> {
    const message = await this.anthropic.messages.create({
      model: this.model,
      max_tokens: 2000,
      messages: [
        {
          role: 'user',
          content: prompt,
        },
      ],
    });

    const content = message.content[0];
    if (!content || content.type !== 'text') {
      throw new NarrativeError('Unexpected response type from Claude');
    }
    return content.text;
  }
}

export class NarrativeGenerator {
  private client: CompletionClient | null;

  constructor(client: CompletionClient | null) {
    this.client = client;
  }

  static fromConfig(config: AnthropicConfig): NarrativeGenerator {
    if (!config.enabled || !config.apiKey) {
      return new NarrativeGenerator(null);
    }
    return new NarrativeGenerator(new AnthropicCompletionClient(config.apiKey, config.model));
  }

  get enabled(): boolean {
    return this.client !== null;
  }

  async generate(analysis: AppAnalysis): Promise<NarrativeBrief> {
    if (!this.client) {
      return placeholderBrief(analysis);
    }

    console.log(`🧠 Generating narrative for ${analysis.appName}...`);
    const text = await this.client.complete(buildPrompt(analysis));

    // Extract JSON from the response
    const jsonMatch = text.match(/\{[\s\S]*\}/);
    if (!jsonMatch) {
      throw new NarrativeError('Could not parse JSON from Claude response');
    }

    let raw: unknown;
    try {
      raw = JSON.parse(jsonMatch[0]);
    } catch {
      throw new NarrativeError('Claude response contained malformed JSON');
    }

    const parsed = briefSchema.safeParse(raw);
    if (!parsed.success) {
      throw new NarrativeError(`Narrative did not match the expected shape: ${parsed.error.issues[0]?.message ?? 'unknown'}`);
    }

    return { appName: analysis.appName, ...parsed.data, generated: true };
  }
}

export function placeholderBrief(analysis: AppAnalysis): NarrativeBrief {
  const { metrics, primaryPillar } = analysis;
  const topCategory = analysis.signals.topPainCategories[0]?.category ?? 'none';

  return {
    appName: analysis.appName,
    headline: `${analysis.appName}: ${metrics.riskBand} risk (${metrics.riskScore}/100), ${metrics.momentum.toLowerCase()}`,
    summary:
      `${metrics.painReviews} of ${metrics.totalReviews} reviews carry pain signals. ` +
      `Primary pillar: ${primaryPillar}. Top category: ${topCategory}.`,
    personas: [],
    strategy: [],
    generated: false,
  };
}

function buildPrompt(analysis: AppAnalysis): string {
  const { metrics, pillarDensities, signals } = analysis;
  const categories = signals.topPainCategories.map((c) => `- ${c.category} (${c.pillar}): ${c.count} reviews`).join('\n');
  const clusters = analysis.clusters.map((c) => `- "${c.phrase}" x${c.count}`).join('\n');
  const evidence = analysis.evidence.map((e, i) => `${i + 1}. "${e.text}"`).join('\n');
  const churn = analysis.migration
    .filter((event) => event.type === 'churn')
    .map((event) => `- ${event.competitorName}: ${event.count}`)
    .join('\n');

  return `You are a product strategist reviewing quantitative app-review signals for "${analysis.appName}".

Metrics:
- Reviews analyzed: ${metrics.totalReviews} (${metrics.painReviews} with pain signals)
- Risk score: ${metrics.riskScore}/100 (${metrics.riskBand})
- Momentum: ${metrics.momentum} (slope ${metrics.volatilitySlope}, delta ${metrics.slopeDelta})
- Pillar densities: functional ${pillarDensities.functional.toFixed(3)}, economic ${pillarDensities.economic.toFixed(3)}, experience ${pillarDensities.experience.toFixed(3)}
- Estimated monthly revenue leakage: $${analysis.revenueLeakage.monthlyUsd.toFixed(0)}

Top pain categories:
${categories || '- none'}

Recurring phrases:
${clusters || '- none'}

Churn destinations:
${churn || '- none'}

Representative reviews:
${evidence || '- none'}

Do not restate or change the numbers. Return a JSON object with this structure:
{
  "headline": "one-line verdict",
  "summary": "two or three sentences",
  "personas": [{ "name": "persona name", "archetype": "short archetype", "story": "one-sentence user story" }],
  "strategy": ["actionable recommendation", "..."]
}`;
}
