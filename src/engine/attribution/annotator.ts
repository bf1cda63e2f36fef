/*
Purpose: attribution blocks for merged declarations and the license notices header of the merged unit.
Assumptions: templates live under templates/ at the package root and compile with Handlebars strict mode.
Usage: const annotator = await AttributionAnnotator.load(); annotator.annotate(declaration, origins).
*/

import path from "node:path";

import fse from "fs-extra";
import Handlebars from "handlebars";

import { USER_FACING_ERROR_CODES, UserFacingError } from "../../core/errors.js";
import { templatesDir } from "../../core/paths.js";
import { compareDescending, compareText } from "../../core/utils.js";
import type {
  AttributionOrigin,
  CanonicalDeclaration,
  DeclarationEntry,
  LibraryUsage,
  LicenseNotice,
  MergedDeclaration,
  Repository,
} from "../model/schema.js";
import type { ReconciledDeclaration } from "../namespace/reconciler.js";

// =============================================================================
// TYPES
// =============================================================================

export type AttributionTemplateName = "attribution" | "notices";

type TemplateSet = Record<AttributionTemplateName, Handlebars.TemplateDelegate>;

// =============================================================================
// PUBLIC API
// =============================================================================

export class AttributionAnnotator {
  private constructor(private readonly templates: TemplateSet) {}

  static async load(root: string = templatesDir()): Promise<AttributionAnnotator> {
    const [attribution, notices] = await Promise.all([
      loadTemplate(root, "attribution"),
      loadTemplate(root, "notices"),
    ]);
    return new AttributionAnnotator({ attribution, notices });
  }

  annotate(
    declaration: Pick<MergedDeclaration, "name" | "rejected">,
    origins: readonly AttributionOrigin[],
  ): string {
    return render(this.templates, "attribution", {
      name: declaration.name,
      origins: origins.map((origin) => ({
        repositoryId: escapeComment(origin.repositoryId),
        licenseId: escapeComment(origin.licenseId),
        revision: origin.revision === null ? null : escapeComment(origin.revision),
        paths: escapeComment(origin.paths.join(", ")),
      })),
      hasRejected: declaration.rejected.length > 0,
      rejected: declaration.rejected.map((match) => ({
        label: escapeComment(`${match.repositoryId}:${match.unitPath}#${match.name}`),
        confidence: match.confidence.toFixed(2),
      })),
    });
  }

  renderNotices(notices: readonly LicenseNotice[], libraries: readonly LibraryUsage[] = []): string {
    if (notices.length === 0 && libraries.length === 0) return "";
    return render(this.templates, "notices", {
      notices: notices.map((notice) => ({
        repositoryId: escapeComment(notice.repositoryId),
        licenseId: escapeComment(notice.licenseId),
        revision: notice.revision === null ? null : escapeComment(notice.revision),
        lines: escapeComment(notice.text)
          .trim()
          .split(/\r?\n/)
          .map((line) => line.trimEnd())
          .map((line) => (line.length > 0 ? ` ${line}` : "")),
      })),
      hasLibraries: libraries.length > 0,
      libraries: libraries.map((library) => ({
        name: escapeComment(library.name),
        repositories: escapeComment(library.repositories.join(", ")),
      })),
    });
  }

  // Fills attribution and annotation for every reconciled declaration.
  annotateAll(
    declarations: readonly ReconciledDeclaration[],
    canonicals: readonly CanonicalDeclaration[],
    entries: readonly DeclarationEntry[],
  ): MergedDeclaration[] {
    return declarations.map((declaration) => {
      const canonical = canonicals[declaration.id];
      const members = (canonical?.subsumed ?? [])
        .map((index) => entries[index])
        .filter((entry): entry is DeclarationEntry => entry !== undefined);
      const attribution = collectOrigins(members);
      return {
        ...declaration,
        attribution,
        annotation: this.annotate(declaration, attribution),
      };
    });
  }
}

// One origin per repository, highest trust first.
export function collectOrigins(members: readonly DeclarationEntry[]): AttributionOrigin[] {
  const byRepository = new Map<string, { repository: Repository; paths: Set<string> }>();
  for (const entry of members) {
    const current = byRepository.get(entry.repository.id);
    if (current) {
      current.paths.add(entry.unit.path);
    } else {
      byRepository.set(entry.repository.id, {
        repository: entry.repository,
        paths: new Set([entry.unit.path]),
      });
    }
  }

  return Array.from(byRepository.values())
    .map(({ repository, paths }) => ({
      repositoryId: repository.id,
      trustRank: repository.trustRank,
      licenseId: repository.license.id,
      revision: repository.revision,
      paths: Array.from(paths).sort(compareText),
    }))
    .sort(
      (a, b) => compareDescending(a.trustRank, b.trustRank) || compareText(a.repositoryId, b.repositoryId),
    );
}

// Notices cover every repository still credited by a surviving declaration.
export function collectNotices(
  declarations: readonly Pick<MergedDeclaration, "attribution">[],
  repositories: readonly Repository[],
): LicenseNotice[] {
  const credited = new Set<string>();
  for (const declaration of declarations) {
    for (const origin of declaration.attribution) credited.add(origin.repositoryId);
  }

  return repositories
    .filter((repository) => credited.has(repository.id))
    .sort(
      (a, b) => compareDescending(a.trustRank, b.trustRank) || compareText(a.id, b.id),
    )
    .map((repository) => ({
      repositoryId: repository.id,
      licenseId: repository.license.id,
      revision: repository.revision,
      text: repository.license.text,
    }));
}

// =============================================================================
// INTERNALS
// =============================================================================

// Templates render inside block comments; a literal `*/` would close them early.
export function escapeComment(value: string): string {
  return value.replace(/\*\//g, "*\\/");
}

const TEMPLATE_ERROR_CODE = USER_FACING_ERROR_CODES.output;
const TEMPLATE_READ_HINT = "Check that the templates directory ships with the package and is readable.";
const TEMPLATE_RENDER_HINT = "Check the template syntax and the fields it references.";

async function loadTemplate(
  root: string,
  name: AttributionTemplateName,
): Promise<Handlebars.TemplateDelegate> {
  const templatePath = path.join(root, `${name}.hbs`);
  let raw: string;
  try {
    raw = await fse.readFile(templatePath, "utf8");
  } catch (err) {
    throw new UserFacingError({
      code: TEMPLATE_ERROR_CODE,
      title: "Attribution template unreadable.",
      message: `Failed to read template "${name}" at ${templatePath}.`,
      hint: TEMPLATE_READ_HINT,
      cause: err,
    });
  }
  return Handlebars.compile(raw, { noEscape: true, strict: true });
}

function render(templates: TemplateSet, name: AttributionTemplateName, values: object): string {
  try {
    return templates[name](values).trim();
  } catch (err) {
    throw new UserFacingError({
      code: TEMPLATE_ERROR_CODE,
      title: "Attribution template failed to render.",
      message: `Template "${name}" could not be rendered.`,
      hint: TEMPLATE_RENDER_HINT,
      cause: err,
    });
  }
}
