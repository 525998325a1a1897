import type { InMemorySemaphore } from '../concurrency/semaphore.js';
import { logger } from '../observability/logger.js';
import type { Document, Issue } from '../types.js';
import { parseAdjudicationResponse } from './parse.js';
import {
  buildAdjudicationSystemPrompt,
  buildAdjudicationUserPrompt,
  buildSpellingFixSystemPrompt,
  buildSpellingFixUserPrompt,
} from './prompts.js';
import { emptyUsage, type UsageStats } from './reviewer.js';
import type { AdjudicationDecision, TextGenerator } from './types.js';

export function needsAdjudication(issue: Issue): boolean {
  return issue.tool !== 'llm'
    && issue.type !== 'tool_failure'
    && issue.line > 0
    && !issue.suppressed
    && issue.adjudication === undefined;
}

function needsSpellingFix(issue: Issue, decision: AdjudicationDecision): boolean {
  return issue.tool === 'languagetool'
    && (issue.code ?? '').endsWith('SPELLER_RULE')
    && Boolean(issue.suggestion)
    && decision.accept
    && !decision.fix;
}

/**
 * Second opinion on checker findings. Issues that already carry an
 * adjudication, LLM findings, document-level findings and suppressed issues
 * pass through untouched.
 */
export class Adjudicator {
  private usage: UsageStats = emptyUsage();

  constructor(
    private readonly generator: TextGenerator,
    private readonly semaphore: InMemorySemaphore,
    private readonly systemPrompt: string = buildAdjudicationSystemPrompt()
  ) {}

  adjudicate(issues: readonly Issue[], document: Document): Promise<Issue[]> {
    return Promise.all(issues.map(issue => {
      if (!needsAdjudication(issue)) {
        return Promise.resolve(issue);
      }
      return this.semaphore.withPermit(() => this.adjudicateIssue(issue, document.lines[issue.line - 1] ?? ''));
    }));
  }

  async adjudicateIssue(issue: Issue, lineText: string): Promise<Issue> {
    try {
      let decision: AdjudicationDecision =
        (await this.ask(this.systemPrompt, buildAdjudicationUserPrompt(issue, lineText))) ?? { accept: true };

      if (needsSpellingFix(issue, decision)) {
        const retry = await this.ask(buildSpellingFixSystemPrompt(), buildSpellingFixUserPrompt(issue, lineText));
        if (retry && retry.accept && retry.fix) {
          decision = retry;
        }
      }

      return { ...issue, adjudication: decision };
    } catch (error) {
      this.usage.failures++;
      logger.warn('adjudication', 'Adjudication failed, issue left undecided', {
        document: issue.file,
        line: issue.line,
        tool: issue.tool,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      return issue;
    }
  }

  getUsage(): UsageStats {
    return { ...this.usage };
  }

  private async ask(systemPrompt: string, userPrompt: string): Promise<AdjudicationDecision | null> {
    this.usage.calls++;
    const response = await this.generator.complete(systemPrompt, userPrompt);
    if (response.usage) {
      this.usage.inputTokens += response.usage.inputTokens;
      this.usage.outputTokens += response.usage.outputTokens;
    }
    return parseAdjudicationResponse(response.text);
  }
}
