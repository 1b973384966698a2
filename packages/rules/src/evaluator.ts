import {
  LEGAL_DISCLAIMER,
  RISK_LEVELS,
  errors,
  type AssessmentResult,
  type Finding,
  type RiskLevel
} from '@juridico/shared';

import { buildCorpus, matchesPredicate, normalizeFacts } from './keywords';
import type { LegalContentLibrary } from './loader';
import type { Rule, RuleTable } from './schemas';

export const FALLBACK_RULE_ID = 'sin_coincidencias';

export function highestRisk(levels: readonly RiskLevel[]): RiskLevel {
  return levels.reduce<RiskLevel>(
    (highest, level) => (RISK_LEVELS.indexOf(level) > RISK_LEVELS.indexOf(highest) ? level : highest),
    'low'
  );
}

function toFinding(rule: Rule): Finding {
  return {
    ruleId: rule.id,
    citedProvisions: [...rule.finding.cited_provisions],
    conclusion: rule.finding.conclusion,
    riskLevel: rule.finding.risk_level,
    recommendedActions: [...rule.finding.recommended_actions]
  };
}

function fallbackFinding(table: RuleTable): Finding {
  return {
    ruleId: FALLBACK_RULE_ID,
    citedProvisions: [...table.fallback.cited_provisions],
    conclusion: table.fallback.conclusion,
    riskLevel: 'low',
    recommendedActions: [...table.fallback.recommended_actions]
  };
}

/**
 * Applies an area's rule table to a set of facts.
 *
 * Every rule is tested, in the order the table declares them, and every match becomes a
 * finding. A table with no match yields its fallback finding instead of an error.
 */
export class LegalRuleEvaluator {
  constructor(private library: LegalContentLibrary) {}

  evaluate(facts: readonly string[], legalQuestion: string, area: string): AssessmentResult {
    const table = this.library.getRuleTable(area);

    const normalized = normalizeFacts(facts);
    if (normalized.length === 0) {
      throw errors.emptyFactSet();
    }

    const corpus = buildCorpus([...normalized, legalQuestion]);
    const matched = table.rules.filter((rule) => matchesPredicate(corpus, rule.when)).map(toFinding);
    const findings = matched.length > 0 ? matched : [fallbackFinding(table)];

    return {
      area: table.area,
      findings,
      riskLevel: highestRisk(findings.map((finding) => finding.riskLevel)),
      disclaimer: LEGAL_DISCLAIMER
    };
  }
}
