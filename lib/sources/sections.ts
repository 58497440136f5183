export type SectionMap = Map<string, string>;

type ClassifierRule = {
  labels: readonly string[];
  fragments: readonly string[];
};

export const SYLLABUS_RULE: ClassifierRule = {
  labels: ["syllabus", "curriculum", "exam syllabus", "syllabus and exam pattern", "syllabus and structure"],
  fragments: ["syllabus", "curriculum", "subjects", "paper", "exam"],
};

export const PATTERN_RULE: ClassifierRule = {
  labels: ["exam pattern", "pattern", "format", "structure", "scheme"],
  fragments: ["pattern", "structure", "format", "scheme", "paper"],
};

/**
 * Exact canonical label first (in label order), then the first heading in
 * document order that contains one of the fragments. No scoring.
 */
export function pickSection(sections: SectionMap, rule: ClassifierRule): string | undefined {
  for (const label of rule.labels) {
    const content = sections.get(label);
    if (content) return content;
  }
  for (const [heading, content] of sections) {
    if (!content) continue;
    if (rule.fragments.some((fragment) => heading.includes(fragment))) return content;
  }
  return undefined;
}

export function pickSyllabus(sections: SectionMap) {
  return pickSection(sections, SYLLABUS_RULE);
}

export function pickPattern(sections: SectionMap) {
  return pickSection(sections, PATTERN_RULE);
}
