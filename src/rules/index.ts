import type { RuleFamilyKind } from "../catalog";
import type { RuleFamily } from "../config";
import type { Document, Finding } from "../types";
import { evaluateAccessibility } from "./accessibility";
import type { EvaluationContext } from "./context";
import { evaluateFormatting } from "./formatting";
import { evaluateGrammar } from "./grammar";
import { evaluateHeadings } from "./headings";
import { evaluateLanguage } from "./language";
import { evaluatePii } from "./pii";
import { evaluateReferences } from "./references";
import { evaluateStructure } from "./structure";
import { evaluateTerminology } from "./terminology";
import { evaluateTraining } from "./training";

export interface BoundEvaluator {
  family: RuleFamilyKind;
  run(document: Document, context: EvaluationContext): Finding[];
}

export function bindEvaluator(family: RuleFamily): BoundEvaluator {
  switch (family.kind) {
    case "structure": {
      const { options } = family;
      return {
        family: family.kind,
        run: (document, context) => evaluateStructure(document, options, context),
      };
    }
    case "headings": {
      const { options } = family;
      return {
        family: family.kind,
        run: (document, context) => evaluateHeadings(document, options, context),
      };
    }
    case "references": {
      const { options } = family;
      return {
        family: family.kind,
        run: (document, context) => evaluateReferences(document, options, context),
      };
    }
    case "terminology": {
      const { options } = family;
      return {
        family: family.kind,
        run: (document, context) => evaluateTerminology(document, options, context),
      };
    }
    case "pii": {
      const { options } = family;
      return {
        family: family.kind,
        run: (document, context) => evaluatePii(document, options, context),
      };
    }
    case "language": {
      const { options } = family;
      return {
        family: family.kind,
        run: (document, context) => evaluateLanguage(document, options, context),
      };
    }
    case "grammar": {
      const { options } = family;
      return {
        family: family.kind,
        run: (document, context) => evaluateGrammar(document, options, context),
      };
    }
    case "formatting": {
      const { options } = family;
      return {
        family: family.kind,
        run: (document, context) => evaluateFormatting(document, options, context),
      };
    }
    case "accessibility": {
      const { options } = family;
      return {
        family: family.kind,
        run: (document, context) => evaluateAccessibility(document, options, context),
      };
    }
    case "training": {
      const { options } = family;
      return {
        family: family.kind,
        run: (document, context) => evaluateTraining(document, options, context),
      };
    }
  }
}
