import {
  errors,
  withDisclaimer,
  type ConstitutionalRightsCheck,
  type ContractValidityCheck,
  type CriminalLiabilityAssessment,
  type ImplicatedRight,
  type PossibleOffense
} from '@juridico/shared';

import { buildCorpus, matchedKeywords, normalizeFacts } from './keywords';
import type { LegalContentLibrary } from './loader';

function corpusOf(parts: readonly string[]): string {
  const normalized = normalizeFacts(parts);
  if (normalized.length === 0) {
    throw errors.emptyFactSet();
  }
  return buildCorpus(normalized);
}

function mentionsAny(corpus: string, keywords: readonly string[]) {
  return matchedKeywords(corpus, keywords).length > 0;
}

/**
 * Fixed-table keyword screens for constitutional rights, contract formation and
 * criminal conduct. Tables come from the content library; nothing here is per-call state.
 */
export class ScenarioScreener {
  constructor(private library: LegalContentLibrary) {}

  checkConstitutionalRights(situation: string): ConstitutionalRightsCheck {
    const corpus = corpusOf([situation]);
    const { constitutionalRights } = this.library.getScreeningTables();

    const violatedRights: ImplicatedRight[] = constitutionalRights.rights
      .filter((entry) => mentionsAny(corpus, entry.keywords))
      .map(({ right, article, description }) => ({ right, article, description }));

    const amparoAdmissible = violatedRights.length > 0;
    return withDisclaimer({
      violatedRights,
      amparoAdmissible,
      recommendation: amparoAdmissible
        ? constitutionalRights.recommendations.implicated
        : constitutionalRights.recommendations.none
    });
  }

  analyzeContractValidity(contractTerms: readonly string[]): ContractValidityCheck {
    const corpus = corpusOf(contractTerms);
    const { contractValidity } = this.library.getScreeningTables();

    const requirements: Record<string, boolean> = {};
    const issues: string[] = [];
    const recommendations: string[] = [];

    contractValidity.elements.forEach((element) => {
      const met = mentionsAny(corpus, element.keywords);
      requirements[element.id] = met;
      if (!met) {
        issues.push(element.issue);
        recommendations.push(element.recommendation);
      }
    });

    return withDisclaimer({
      isValid: issues.length === 0,
      requirements,
      issues,
      citedProvisions: [...contractValidity.cited_provisions],
      recommendations
    });
  }

  assessCriminalLiability(facts: readonly string[]): CriminalLiabilityAssessment {
    const corpus = corpusOf(facts);
    const { criminalOffenses } = this.library.getScreeningTables();

    const possibleOffenses: PossibleOffense[] = criminalOffenses.offenses
      .filter((entry) => mentionsAny(corpus, entry.keywords))
      .map((entry) => ({
        offense: entry.offense,
        elements: [...entry.elements],
        penalty: entry.penalty,
        citedProvisions: [...entry.cited_provisions]
      }));

    const detected = possibleOffenses.length > 0;
    return withDisclaimer({
      possibleOffenses,
      possibleDefenses: detected ? [...criminalOffenses.defenses] : [],
      recommendation: detected ? criminalOffenses.recommendations.detected : criminalOffenses.recommendations.none
    });
  }
}
