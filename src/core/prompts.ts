import { USAGE_LIKE_SECTIONS } from "../constants.js";
import { normalizeHeading } from "./markdown.js";
import type { RepositoryInfo, SectionDescriptor } from "./types.js";

export const CODE_SAMPLE_EXCERPT_CHARS = 500;

// -----------------------------------------------------------------------------
// Shared blocks
// -----------------------------------------------------------------------------

/** Sent as the system message on every completion. */
export const SYSTEM_PROMPT =
  "You write GitHub README files in Markdown. Reply with the requested Markdown only, without preamble, commentary or a surrounding code fence.";

const WRITING_GUIDELINES = `Writing guidelines (write as a senior technical writer):

Tone and voice:
- Write with authority and professionalism.
- Use active voice and the imperative mood for instructions.
- Be direct and concise; every word must add value.
- Assume readers have basic technical knowledge.
- Never use first person (we/I/our); use second person (you) or third person (the project, this library).

Content quality:
- Be specific: give exact versions, commands and values.
- Avoid filler words and unnecessary explanations.
- Do not state the obvious.
- Use precise technical terminology.

Structure:
- Start with the most important information.
- Keep paragraphs short (2-4 sentences).
- Use lists for steps or multiple items.
- Use fenced code blocks for all commands, code and configuration.

Avoid:
- Vague statements such as "recent version", "as needed", "if applicable".
- Marketing speak, casual phrasing and apologetic or uncertain language.`;

const SECTION_INSTRUCTIONS: Readonly<Record<string, string>> = {
  introduction: `- Open with a single, clear sentence stating what the project does.
- State the specific problem or use case it addresses.
- Highlight 2-3 key benefits.
- Keep it to 2-3 short paragraphs without background stories.`,
  "table of contents": `- Create Markdown links to every section listed below.
- Use a bulleted list of anchor links: [Section Name](#section-name), lowercase with spaces replaced by hyphens.
- Do not link to the Table of Contents itself.
- Keep the listed order. No decorations or emojis.`,
  features: `- Use concise bullet points, one line per feature.
- State user-facing capabilities, not implementation details.
- Avoid vague terms like "powerful" or "flexible".
- Group related features with sub-bullets if needed.`,
  "tech stack": `- List the primary technologies found in the repository's manifest files.
- Include version numbers when the dependency files pin them.
- Organize by category (backend, frontend, database, tooling, testing).
- Keep to the 5-10 most important technologies. Never leave this section empty.`,
  prerequisites: `- List required software with minimum versions.
- Include system requirements and accounts or API keys needed.
- Separate required from optional prerequisites.`,
  installation: `- Provide numbered steps in logical order.
- Include the git clone command with the repository URL.
- Show the package installation commands and any environment setup.
- One code block per distinct step.
- Stop once installation is complete; running the project belongs in Usage.`,
  configuration: `- List configuration options in a table: name, type, default, description.
- Show example configuration files and environment variables.
- Mark required versus optional settings.`,
  usage: `- Start with how to run the project.
- Show the simplest working example, then 2-3 common use cases.
- Provide runnable code with the imports it needs, not pseudocode.
- Do not repeat installation steps.`,
  "api reference": `- Document the key endpoints, functions or classes.
- Use a consistent format: signature, parameters, return value, example.
- Include HTTP methods and routes for REST APIs with request/response examples.`,
  "project structure": `- Display a directory tree of the key folders and files in a code block.
- Add brief descriptions for important directories and configuration files.`,
  testing: `- Provide the commands that run the tests.
- Name the test frameworks and the kinds of tests (unit, integration, e2e).
- Show how to run a single suite and how to collect coverage if available.`,
  deployment: `- Provide deployment steps in order.
- Name the target platforms.
- Include build commands and environment configuration.`,
  contributing: `- Explain how to report issues and submit pull requests.
- Provide development setup steps.
- Describe coding standards, branch naming and commit conventions.`,
  license: `- State the license type at the top.
- Link to the license file only if it exists (see the license information).
- Briefly explain key permissions and restrictions without legal interpretation.`,
};

function repositoryFacts(repo: RepositoryInfo): string {
  const topics = repo.topics.length > 0 ? repo.topics.join(", ") : "None";
  return `Repository information:
- Name: ${repo.name}
- Description: ${repo.description ?? "No description provided"}
- Primary language: ${repo.language ?? "Not specified"}
- Clone URL: ${repo.cloneUrl ?? "Not available"}
- Topics: ${topics}`;
}

function licenseContext(repo: RepositoryInfo): string {
  const lines = ["License information:"];
  if (repo.license) lines.push(`- License type: ${repo.license}`);
  lines.push(
    repo.licenseFile
      ? `- License file: ${repo.licenseFile} (exists in repository)`
      : "- No license file found in the repository root; do not link to one",
  );
  return lines.join("\n");
}

function tableOfContentsContext(allSections: readonly SectionDescriptor[]): string {
  const entries = allSections
    .filter((s) => normalizeHeading(s.name) != "table of contents")
    .map((s) => `- ${s.name}`);
  return `Sections to include in the Table of Contents:\n${entries.join("\n")}`;
}

function codeSampleContext(samples: Record<string, string> | undefined): string {
  const files = Object.entries(samples ?? {});
  if (files.length == 0) return "";

  const excerpts = files.map(([path, content]) => {
    const excerpt =
      content.length > CODE_SAMPLE_EXCERPT_CHARS
        ? `${content.slice(0, CODE_SAMPLE_EXCERPT_CHARS)}...`
        : content;
    return `File: ${path}\n\`\`\`\n${excerpt}\n\`\`\``;
  });
  return `Code samples for reference:\n\n${excerpts.join("\n\n")}`;
}

function compose(parts: string[]): string {
  return parts.filter((part) => part.length > 0).join("\n\n");
}

// -----------------------------------------------------------------------------
// Generation prompts
// -----------------------------------------------------------------------------

export function buildHeaderPrompt(repo: RepositoryInfo): string {
  return compose([
    `Create only the header of a README.md for the repository: ${repo.name}`,
    repositoryFacts(repo),
    `Requirements:
1. The first line is the H1 title: # ${repo.name}
2. Then one plain-text sentence describing what the project does (not a heading).
3. Then relevant badges if appropriate (build status, version, license, language).`,
    WRITING_GUIDELINES,
    `Important:
- Output exactly one H1 title line, one description line and optional badges.
- Do not add any other section (no Introduction, no Table of Contents).
- Do not add any ## or deeper headings.`,
  ]);
}

export function buildSectionPrompt(
  section: SectionDescriptor,
  repo: RepositoryInfo,
  allSections: readonly SectionDescriptor[],
): string {
  const key = normalizeHeading(section.name);
  const instructions = SECTION_INSTRUCTIONS[key];

  const context: string[] = [];
  if (key == "license") context.push(licenseContext(repo));
  if (key == "table of contents") context.push(tableOfContentsContext(allSections));

  const body = instructions
    ? `This section should:\n${instructions}`
    : `Section description: ${section.description}

This section should address the described purpose while being:
- Clear and actionable
- Relevant to the project
- Well-formatted in Markdown`;

  return compose([
    `Create ONLY the "${section.name}" section for this README.`,
    repositoryFacts(repo),
    ...context,
    body,
    WRITING_GUIDELINES,
    `Format as: ## ${section.name}`,
    USAGE_LIKE_SECTIONS.includes(key) ? codeSampleContext(repo.codeSamples) : "",
  ]);
}

// -----------------------------------------------------------------------------
// Refinement prompts
// -----------------------------------------------------------------------------

export function buildRefinePrompt(content: string, feedback: string): string {
  return `You are an expert technical writer improving README documentation.

Below is a README.md file that needs to be refined based on user feedback:

\`\`\`markdown
${content}
\`\`\`

User feedback:
${feedback}

Revise the README to address this feedback while keeping proper Markdown formatting and complete coverage of the project.

Return ONLY the revised document, without any additional explanation or conversation.`;
}

export function buildClassifyPrompt(feedback: string): string {
  return `Analyze the following feedback for a README.md file and identify which sections need to be refined.

README feedback:
${feedback}

Respond with ONLY a comma-separated list of section names that need to be refined.
If the feedback is general or applies to the entire document, respond with "ALL".
Do not include any other text in your response.`;
}

export function buildChunkRefinePrompt(chunk: string, feedback: string): string {
  return `Refine the following portion of a README.md file based on this feedback:

Feedback: ${feedback}

README portion:
\`\`\`markdown
${chunk}
\`\`\`

Respond with ONLY the refined portion in Markdown format.
Keep all section headings and structure exactly as they appear.`;
}

export function buildSectionRefinePrompt(
  sectionName: string,
  body: string,
  feedback: string,
): string {
  return `Refine the following section of a README.md file based on this feedback:

Feedback: ${feedback}

Section: ${sectionName}
\`\`\`markdown
${body}
\`\`\`

Respond with ONLY the refined section in Markdown format.
Keep the section heading exactly as it appears.`;
}

/** Feedback used when an existing README is improved instead of regenerated. */
export function buildImprovementFeedback(
  repo: RepositoryInfo,
  sections: readonly SectionDescriptor[],
): string {
  const names = sections.map((s) => s.name).join(", ");
  return `Improve this existing README. Sections to enhance or add: ${names}.

${repositoryFacts(repo)}
- License: ${repo.license ?? "Not specified"}
- License file: ${repo.licenseFile ?? "None found"}

Guidelines:
- Keep good existing content but enhance it.
- Add the missing sections from the requested list.
- Use the repository information above for accuracy.
- Only link to license files that actually exist.`;
}
