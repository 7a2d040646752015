/*
 * Generates per-folder API docs from the JSDoc of exported symbols.
 * - docs/<folder>/README.md: markdown per source folder
 * - docs/<folder>/index.html: the same page rendered with marked
 * - docs/FOLDERS.md: index of the generated folders
 * Usage: npm run docs
 */
import { Node, Project, type JSDoc, type SourceFile } from 'ts-morph';
import fg from 'fast-glob';
import * as path from 'path';
import fs from 'fs-extra';
import { marked } from 'marked';

const SRC_DIR = path.resolve('src');
const DOCS_DIR = path.resolve('docs');

interface RenderedSymbol {
  kind: string;
  name: string;
  parent?: string;
  description?: string;
  params: { name: string; doc?: string }[];
  returns?: string;
  throws?: string;
}

const project = new Project({
  tsConfigFilePath: path.resolve('tsconfig.json'),
  skipAddingFilesFromTsConfig: true,
});

function isInternal(docs: JSDoc[]): boolean {
  return docs.some((doc) => doc.getTags().some((tag) => tag.getTagName() === 'internal'));
}

function renderDocs(
  node: Node,
  name: string,
  kind: string,
  parent?: string
): RenderedSymbol | null {
  if (!Node.isJSDocable(node)) return null;
  const docs = node.getJsDocs();
  if (!docs.length || isInternal(docs)) return null;
  const primary = docs[docs.length - 1];
  const tags = primary.getTags();
  const params: RenderedSymbol['params'] = [];
  let returns: string | undefined;
  let throws: string | undefined;
  for (const tag of tags) {
    if (Node.isJSDocParameterTag(tag)) {
      params.push({ name: tag.getName(), doc: tag.getCommentText()?.trim() });
    } else if (tag.getTagName() === 'returns') {
      returns = tag.getCommentText()?.trim();
    } else if (tag.getTagName() === 'throws') {
      throws = tag.getCommentText()?.trim();
    }
  }
  return {
    kind,
    name,
    parent,
    description: primary.getDescription().trim() || undefined,
    params,
    returns,
    throws,
  };
}

function collectFile(sf: SourceFile): RenderedSymbol[] {
  const symbols: RenderedSymbol[] = [];
  for (const [exportName, declarations] of sf.getExportedDeclarations()) {
    for (const decl of declarations) {
      if (decl.getSourceFile() !== sf) continue; // re-exports are documented at their source
      const name = exportName === 'default' ? sf.getBaseNameWithoutExtension() : exportName;
      const rendered = renderDocs(
        Node.isVariableDeclaration(decl) ? decl.getVariableStatementOrThrow() : decl,
        name,
        decl.getKindName()
      );
      if (rendered) symbols.push(rendered);
      if (Node.isClassDeclaration(decl)) {
        for (const member of decl.getMembers()) {
          if (!Node.hasName(member) || member.getName().startsWith('_')) continue;
          const memberDoc = renderDocs(member, member.getName(), member.getKindName(), name);
          if (memberDoc) symbols.push(memberDoc);
        }
      }
    }
  }
  return symbols;
}

function renderSymbol(symbol: RenderedSymbol, heading: string): string[] {
  const lines = [`${heading} ${symbol.name}`, '', `_${symbol.kind}_`];
  if (symbol.description) lines.push('', symbol.description);
  if (symbol.params.length) {
    lines.push('', 'Parameters:');
    for (const param of symbol.params) {
      lines.push(`- \`${param.name}\`${param.doc ? ` - ${param.doc}` : ''}`);
    }
  }
  if (symbol.returns) lines.push('', `Returns: ${symbol.returns}`);
  if (symbol.throws) lines.push('', `Throws: ${symbol.throws}`);
  lines.push('');
  return lines;
}

function buildDirectoryReadme(relDir: string, files: Map<string, RenderedSymbol[]>): string {
  const lines = [`# ${relDir === '' ? 'src' : relDir.replace(/\\/g, '/')}`, ''];
  for (const file of [...files.keys()].sort()) {
    const symbols = files.get(file) ?? [];
    if (!symbols.length) continue;
    lines.push(`## ${path.relative(SRC_DIR, file).replace(/\\/g, '/')}`, '');
    for (const symbol of symbols.filter((s) => !s.parent)) {
      lines.push(...renderSymbol(symbol, '###'));
      for (const member of symbols.filter((s) => s.parent === symbol.name)) {
        lines.push(...renderSymbol(member, '####'));
      }
    }
  }
  return lines.join('\n').trim() + '\n';
}

async function writeIfChanged(file: string, content: string): Promise<void> {
  if (await fs.pathExists(file)) {
    const prev = await fs.readFile(file, 'utf8');
    if (prev === content) return;
  }
  await fs.outputFile(file, content, 'utf8');
}

function htmlPage(title: string, body: string): string {
  return `<!DOCTYPE html><html><head><meta charset="utf-8"><title>${title}</title>
<meta name="viewport" content="width=device-width,initial-scale=1">
<style>
body{font-family:system-ui,-apple-system,Segoe UI,Arial,sans-serif;max-width:900px;margin:0 auto;padding:24px;line-height:1.55;color:#222;}
pre{background:#1e1e1e;color:#eee;padding:12px;border-radius:6px;overflow:auto;}
code{background:#f5f5f5;padding:2px 4px;border-radius:4px;font-size:90%;}
pre code{background:transparent;padding:0;}
</style></head><body>
${body}
</body></html>`;
}

async function main(): Promise<void> {
  await fs.ensureDir(DOCS_DIR);
  const filePaths = await fg(['**/*.ts'], { cwd: SRC_DIR, absolute: true, ignore: ['**/*.d.ts'] });
  for (const filePath of filePaths) project.addSourceFileAtPath(filePath);

  const dirMap = new Map<string, Map<string, RenderedSymbol[]>>();
  for (const sf of project.getSourceFiles()) {
    const dir = path.dirname(sf.getFilePath());
    const files = dirMap.get(dir) ?? new Map<string, RenderedSymbol[]>();
    files.set(sf.getFilePath(), collectFile(sf));
    dirMap.set(dir, files);
  }
  console.log(`[docs] Loaded ${filePaths.length} source files`);

  const index = ['# Docs Index', ''];
  for (const [dir, files] of [...dirMap].sort(([a], [b]) => a.localeCompare(b))) {
    const relDir = path.relative(SRC_DIR, dir);
    const outDir = path.join(DOCS_DIR, relDir === '' ? 'src' : relDir);
    const md = buildDirectoryReadme(relDir, files);
    await writeIfChanged(path.join(outDir, 'README.md'), md);
    const html = htmlPage(relDir || 'src', await marked.parse(md));
    await writeIfChanged(path.join(outDir, 'index.html'), html);
    const link = path.relative(DOCS_DIR, outDir).replace(/\\/g, '/');
    index.push(`- [${link}](${link}/README.md) - ${files.size} file${files.size > 1 ? 's' : ''}`);
  }
  await writeIfChanged(path.join(DOCS_DIR, 'FOLDERS.md'), index.join('\n') + '\n');
  console.log('[docs] Per-folder README generation complete.');
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
