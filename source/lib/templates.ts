import { readFile } from "fs/promises";
import { join } from "path";

export type TrackingDoc = "TODO.md" | "PROJECT.md";

export const TRACKING_DOCS: readonly TrackingDoc[] = ["TODO.md", "PROJECT.md"];

/** Placeholder replaced with the project name in every template. */
export const PROJECT_NAME_PLACEHOLDER = "{{PROJECT_NAME}}";

const TODO_TEMPLATE = `# Project TODO: {{PROJECT_NAME}}

> This file tracks project progress, decisions, and tasks.
> Claude will read and update this file throughout the project lifecycle.

## Current Sprint / Focus

- [ ] Define project requirements
- [ ] Set up project structure

## Backlog

<!-- Add future tasks here -->

## In Progress

<!-- Tasks currently being worked on -->

## Completed

<!--
Mark completed items as:
- [x] ~~Task description~~ (date or session)
-->

## Decisions Log

<!--
Document important decisions:
- **Decision**: Description of what was decided and why
-->

---

*Last updated: Project initialization*
`;

const PROJECT_TEMPLATE = `# Project: {{PROJECT_NAME}}

> Living description of what this project is and how it is built.
> Claude reads this file at session start alongside the rules in \`.claude/\`.

## Overview

<!-- One paragraph: what the project does and for whom -->

## Goals

- [ ] <!-- Primary goal -->

## Tech Stack

<!-- Languages, frameworks, databases, hosting -->

## Architecture

<!-- Layers and main components; see clean-architecture.md -->

## Conventions

- Coding rules live in \`.claude/*.md\`
- Progress is tracked in \`.claude/TODO.md\`

## Notes

<!-- Anything else a new contributor should know -->
`;

const BUILT_IN: Record<TrackingDoc, string> = {
  "TODO.md": TODO_TEMPLATE,
  "PROJECT.md": PROJECT_TEMPLATE,
};

/**
 * Name of the optional override in the rule source directory,
 * e.g. TODO.md -> TODO-template.md.
 */
export function templateFileName(doc: TrackingDoc): string {
  return doc.replace(/\.md$/, "-template.md");
}

export function renderTemplate(template: string, projectName: string): string {
  return template.split(PROJECT_NAME_PLACEHOLDER).join(projectName);
}

/**
 * Render a tracking document for a project. A `<NAME>-template.md` file in
 * the source directory replaces the built-in template when present.
 */
export async function renderTrackingDoc(
  doc: TrackingDoc,
  projectName: string,
  sourceDir?: string
): Promise<string> {
  let template = BUILT_IN[doc];
  if (sourceDir) {
    try {
      template = await readFile(join(sourceDir, templateFileName(doc)), "utf-8");
    } catch {
      // No override, keep the built-in template
    }
  }
  return renderTemplate(template, projectName);
}
