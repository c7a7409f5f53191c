import fs from "node:fs";
import path from "node:path";
import Database from "better-sqlite3";
import { nanoid } from "nanoid";
import { createModuleLogger } from "../core/logger";

const log = createModuleLogger("content-store");

export interface CompanyContent {
  slug: string;
  subject_id: string;
  instance_id: string;
  name: string;
  category: string;
  jurisdiction: string;
  domain: string | null;
  summary: string;
  profile: unknown;
  coverage: number;
  partial: boolean;
}

export interface ArticleContent {
  slug: string;
  subject_id: string;
  instance_id: string;
  title: string;
  article_type: string;
  summary: string;
  content: string;
  sections: unknown;
  coverage: number;
  partial: boolean;
}

export interface ArticleAsset {
  url: string;
  prompt: string;
}

export interface StoredContent {
  id: string;
  slug: string;
}

export interface ContentStore {
  saveCompany(content: CompanyContent): StoredContent;
  saveArticle(content: ArticleContent, assets: readonly ArticleAsset[]): StoredContent;
  ping(): void;
  close(): void;
}

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS companies (
    id TEXT PRIMARY KEY,
    slug TEXT NOT NULL UNIQUE,
    subject_id TEXT NOT NULL,
    instance_id TEXT NOT NULL,
    name TEXT NOT NULL,
    category TEXT NOT NULL,
    jurisdiction TEXT NOT NULL,
    domain TEXT,
    summary TEXT NOT NULL,
    profile TEXT NOT NULL DEFAULT '{}',
    coverage REAL NOT NULL,
    partial INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS articles (
    id TEXT PRIMARY KEY,
    slug TEXT NOT NULL UNIQUE,
    subject_id TEXT NOT NULL,
    instance_id TEXT NOT NULL,
    title TEXT NOT NULL,
    article_type TEXT NOT NULL,
    summary TEXT NOT NULL,
    content TEXT NOT NULL,
    sections TEXT NOT NULL DEFAULT '[]',
    coverage REAL NOT NULL,
    partial INTEGER NOT NULL DEFAULT 0,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS article_assets (
    article_id TEXT NOT NULL REFERENCES articles(id) ON DELETE CASCADE,
    position INTEGER NOT NULL,
    url TEXT NOT NULL,
    prompt TEXT NOT NULL,
    PRIMARY KEY (article_id, position)
  );
`;

interface IdRow {
  id: string;
}

export class SqliteContentStore implements ContentStore {
  private readonly db: Database.Database;

  constructor(filename: string) {
    if (filename !== ":memory:") {
      fs.mkdirSync(path.dirname(filename), { recursive: true });
    }
    this.db = new Database(filename);
    this.db.pragma("journal_mode = WAL");
    this.db.pragma("foreign_keys = ON");
    this.db.exec(SCHEMA);
    log.info("content store ready", { filename });
  }

  saveCompany(content: CompanyContent): StoredContent {
    const now = new Date().toISOString();
    const row = this.db
      .prepare<[Record<string, unknown>], IdRow>(
        `INSERT INTO companies (id, slug, subject_id, instance_id, name, category,
           jurisdiction, domain, summary, profile, coverage, partial, created_at, updated_at)
         VALUES (@id, @slug, @subject_id, @instance_id, @name, @category,
           @jurisdiction, @domain, @summary, @profile, @coverage, @partial, @now, @now)
         ON CONFLICT(slug) DO UPDATE SET
           subject_id = excluded.subject_id,
           instance_id = excluded.instance_id,
           name = excluded.name,
           category = excluded.category,
           jurisdiction = excluded.jurisdiction,
           domain = excluded.domain,
           summary = excluded.summary,
           profile = excluded.profile,
           coverage = excluded.coverage,
           partial = excluded.partial,
           updated_at = excluded.updated_at
         RETURNING id`,
      )
      .get({
        id: nanoid(),
        slug: content.slug,
        subject_id: content.subject_id,
        instance_id: content.instance_id,
        name: content.name,
        category: content.category,
        jurisdiction: content.jurisdiction,
        domain: content.domain,
        summary: content.summary,
        profile: JSON.stringify(content.profile),
        coverage: content.coverage,
        partial: content.partial ? 1 : 0,
        now,
      });

    if (!row) {
      throw new Error(`company upsert returned no row for ${content.slug}`);
    }
    return { id: row.id, slug: content.slug };
  }

  saveArticle(
    content: ArticleContent,
    assets: readonly ArticleAsset[],
  ): StoredContent {
    const upsert = this.db.prepare<[Record<string, unknown>], IdRow>(
      `INSERT INTO articles (id, slug, subject_id, instance_id, title, article_type,
         summary, content, sections, coverage, partial, created_at, updated_at)
       VALUES (@id, @slug, @subject_id, @instance_id, @title, @article_type,
         @summary, @content, @sections, @coverage, @partial, @now, @now)
       ON CONFLICT(slug) DO UPDATE SET
         subject_id = excluded.subject_id,
         instance_id = excluded.instance_id,
         title = excluded.title,
         article_type = excluded.article_type,
         summary = excluded.summary,
         content = excluded.content,
         sections = excluded.sections,
         coverage = excluded.coverage,
         partial = excluded.partial,
         updated_at = excluded.updated_at
       RETURNING id`,
    );
    const clearAssets = this.db.prepare<[string]>(
      "DELETE FROM article_assets WHERE article_id = ?",
    );
    const insertAsset = this.db.prepare<[string, number, string, string]>(
      "INSERT INTO article_assets (article_id, position, url, prompt) VALUES (?, ?, ?, ?)",
    );

    const write = this.db.transaction((): StoredContent => {
      const row = upsert.get({
        id: nanoid(),
        slug: content.slug,
        subject_id: content.subject_id,
        instance_id: content.instance_id,
        title: content.title,
        article_type: content.article_type,
        summary: content.summary,
        content: content.content,
        sections: JSON.stringify(content.sections),
        coverage: content.coverage,
        partial: content.partial ? 1 : 0,
        now: new Date().toISOString(),
      });
      if (!row) {
        throw new Error(`article upsert returned no row for ${content.slug}`);
      }
      clearAssets.run(row.id);
      assets.forEach((asset, position) => {
        insertAsset.run(row.id, position, asset.url, asset.prompt);
      });
      return { id: row.id, slug: content.slug };
    });

    return write();
  }

  /** Test and CLI helper: raw row lookup by table and slug. */
  findBySlug(
    table: "companies" | "articles",
    slug: string,
  ): Record<string, unknown> | undefined {
    return this.db
      .prepare<[string], Record<string, unknown>>(
        `SELECT * FROM ${table} WHERE slug = ?`,
      )
      .get(slug);
  }

  listAssets(articleId: string): ArticleAsset[] {
    return this.db
      .prepare<[string], ArticleAsset>(
        "SELECT url, prompt FROM article_assets WHERE article_id = ? ORDER BY position",
      )
      .all(articleId);
  }

  ping(): void {
    this.db.prepare("SELECT 1").get();
  }

  close(): void {
    this.db.close();
  }
}
