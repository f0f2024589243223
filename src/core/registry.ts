import fs from "fs";
import path from "path";
import { ProjectNotFoundError, formatErrorMessage } from "./errors";
import { logger } from "./logger";
import { projectIdForPath, validateRules, type Project, type ProjectRules } from "./project";
import { writeJsonAtomic } from "../utils/fs";

type RegistryFile = {
  version: 1;
  projects: Record<string, Project>;
};

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((entry) => typeof entry === "string");
}

function parseRules(raw: unknown): ProjectRules | null {
  if (!isObject(raw)) return null;
  const { extensions, excludeDirs, maxFileBytes, ignoreFile, respectGitignore, chunkSize, chunkOverlap } = raw;
  if (!isStringArray(extensions) || !isStringArray(excludeDirs)) return null;
  if (typeof maxFileBytes !== "number" || typeof chunkSize !== "number" || typeof chunkOverlap !== "number") {
    return null;
  }
  if (typeof ignoreFile !== "string" || typeof respectGitignore !== "boolean") return null;
  return { extensions, excludeDirs, maxFileBytes, ignoreFile, respectGitignore, chunkSize, chunkOverlap };
}

function parseProject(id: string, raw: unknown): Project | null {
  if (!isObject(raw)) return null;
  const rules = parseRules(raw.rules);
  if (typeof raw.root !== "string" || !rules) return null;
  const registeredAt = typeof raw.registeredAt === "string" ? raw.registeredAt : new Date(0).toISOString();
  return { id, root: raw.root, rules, registeredAt };
}

/**
 * The persisted set of watched projects. Passed explicitly to whoever needs
 * it; there is no process-wide project list.
 */
export class ProjectRegistry {
  private projects: Map<string, Project> | null = null;

  constructor(private readonly filePath: string) {}

  private load(): Map<string, Project> {
    if (this.projects) return this.projects;
    const out = new Map<string, Project>();
    if (fs.existsSync(this.filePath)) {
      try {
        const parsed: unknown = JSON.parse(fs.readFileSync(this.filePath, "utf8"));
        const entries = isObject(parsed) && isObject(parsed.projects) ? parsed.projects : {};
        for (const [id, raw] of Object.entries(entries)) {
          const project = parseProject(id, raw);
          if (project) {
            out.set(id, project);
          } else {
            logger.warn(`Skipping malformed registry entry ${id}`);
          }
        }
      } catch (err) {
        logger.warn(`Failed to read project registry ${this.filePath}: ${formatErrorMessage(err)}`);
      }
    }
    this.projects = out;
    return out;
  }

  /** Drops the cached view so the next read sees what other processes wrote. */
  refresh(): void {
    this.projects = null;
  }

  private persist(): void {
    const file: RegistryFile = { version: 1, projects: Object.fromEntries(this.load()) };
    writeJsonAtomic(this.filePath, file);
  }

  list(): Project[] {
    return Array.from(this.load().values()).sort((a, b) => a.root.localeCompare(b.root));
  }

  get(id: string): Project | undefined {
    return this.load().get(id);
  }

  /** Accepts a project id or any path that resolves to a registered root. */
  find(ref: string): Project | undefined {
    const byId = this.get(ref);
    if (byId) return byId;
    return this.get(projectIdForPath(path.resolve(ref)));
  }

  require(ref: string): Project {
    const project = this.find(ref);
    if (!project) throw new ProjectNotFoundError(ref);
    return project;
  }

  upsert(root: string, rules: ProjectRules, now = new Date()): Project {
    const absolute = path.resolve(root);
    const id = projectIdForPath(absolute);
    this.refresh();
    const existing = this.get(id);
    const project: Project = {
      id,
      root: absolute,
      rules: validateRules(rules),
      registeredAt: existing?.registeredAt ?? now.toISOString()
    };
    this.load().set(id, project);
    this.persist();
    return project;
  }

  remove(id: string): boolean {
    this.refresh();
    const projects = this.load();
    if (!projects.delete(id)) return false;
    this.persist();
    return true;
  }
}
