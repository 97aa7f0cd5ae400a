/**
 * Prompt templates. The keyword and reference layouts must stay in sync with
 * the grammars in parsing/.
 */

export const ARXIV_ASSISTANT_PRESET =
  "You are an arXiv research assistant. You recommend papers and follow the user's output format exactly.";

export function keywordPrompt(query: string, referenceCount: number, keywordCount: number): string {
  return [
    `List at least ${referenceCount} references for the research described below.`,
    `To find them, give me exactly ${keywordCount} arXiv search keywords; I will run each one against arXiv`,
    `and send you the results so you can pick the ${referenceCount} most relevant papers.`,
    `Your output must be the ${keywordCount} keywords on a single line, in this form:`,
    "[query]: keyword1, keyword2, keyword3",
    `User input: ${query}`
  ].join("\n");
}

export function synthesisPrompt(candidates: string, referenceCount: number): string {
  return [
    `From the papers below, return the ${referenceCount} most suitable references.`,
    "```",
    candidates,
    "```",
    "Your output must use exactly this format, one reference per line:",
    "[1] title1(url1);",
    "[2] title2(url2);",
    "[3] title3(url3);",
    "Output nothing else."
  ].join("\n");
}

export function insightsPrompt(paper: string): string {
  return [
    "List the key insights of the paper below and the lessons learned from it, as bullet points.",
    "```",
    paper,
    "```",
    "Output format:",
    "Key insights:",
    "- ...",
    "Lessons learned:",
    "- ..."
  ].join("\n");
}

export function directionsPrompt(paper: string): string {
  return [
    "Suggest 3-5 related topics or future research directions for the paper below, as bullet points.",
    "```",
    paper,
    "```",
    "Output format:",
    "Suggestions:",
    "- ..."
  ].join("\n");
}
