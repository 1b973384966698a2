import type { DocumentType, LegalArea, RiskLevel } from './schemas';

export interface DocumentRequest {
  documentType: DocumentType;
  fields: Record<string, unknown>;
}

export interface DocumentSection {
  title: string;
  body: string;
}

export interface GeneratedDocument {
  documentType: DocumentType;
  title: string;
  renderedText: string;
  sections: readonly DocumentSection[];
  /** ISO 8601 timestamp of generation. */
  generatedAt: string;
  notice: string;
}

export interface CaseFacts {
  facts: string[];
  legalQuestion: string;
  area: LegalArea;
}

export interface Finding {
  ruleId: string;
  citedProvisions: string[];
  conclusion: string;
  riskLevel: RiskLevel;
  recommendedActions: string[];
}

export interface AssessmentResult {
  area: LegalArea;
  findings: Finding[];
  riskLevel: RiskLevel;
  disclaimer: string;
}

export interface AreaClassification {
  area: LegalArea;
  matchedKeywords: string[];
  defaulted: boolean;
  disclaimer: string;
}

export interface ImplicatedRight {
  right: string;
  article: string;
  description: string;
}

export interface ConstitutionalRightsCheck {
  violatedRights: ImplicatedRight[];
  amparoAdmissible: boolean;
  recommendation: string;
  disclaimer: string;
}

export interface ContractValidityCheck {
  isValid: boolean;
  requirements: Record<string, boolean>;
  issues: string[];
  citedProvisions: string[];
  recommendations: string[];
  disclaimer: string;
}

export interface PossibleOffense {
  offense: string;
  elements: string[];
  penalty: string;
  citedProvisions: string[];
}

export interface CriminalLiabilityAssessment {
  possibleOffenses: PossibleOffense[];
  possibleDefenses: string[];
  recommendation: string;
  disclaimer: string;
}

export interface DocumentTypeDescriptor {
  documentType: DocumentType;
  title: string;
  requiredFields: string[];
  optionalFields: string[];
}
