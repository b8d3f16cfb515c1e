import matter from 'gray-matter';
import { ContentResolutionError, getErrorMessage } from '../errors.js';
import { readText } from '../fs.js';
import type { ResourceLocation } from '../types.js';

export type FetchLike = (url: string) => Promise<{ ok: boolean; status: number; text(): Promise<string> }>;

export interface LoadedContent {
  content: string;
  frontMatter: Record<string, unknown>;
}

function stripFrontMatter(where: string, raw: string): LoadedContent {
  let fm: matter.GrayMatterFile<string>;
  try {
    // an options object skips gray-matter's per-input cache, so a bad header fails on every read
    fm = matter(raw, {});
  } catch (e) {
    throw new ContentResolutionError(`Cannot parse front matter in ${where}: ${getErrorMessage(e)}`, { cause: e });
  }
  // gray-matter keeps the trailing newline; drop one so content matches what was authored
  const content = fm.content.endsWith('\n') ? fm.content.slice(0, -1) : fm.content;
  return { content: content.replace(/^\r?\n/, ''), frontMatter: { ...fm.data } };
}

export async function loadLocation(location: ResourceLocation, fetchImpl: FetchLike): Promise<LoadedContent> {
  switch (location.type) {
    case 'file': {
      let raw: string;
      try {
        raw = await readText(location.path);
      } catch (e) {
        throw new ContentResolutionError(`Cannot read ${location.path}: ${getErrorMessage(e)}`, { cause: e });
      }
      return location.path.endsWith('.md') ? stripFrontMatter(location.path, raw) : { content: raw, frontMatter: {} };
    }
    case 'url': {
      let res: Awaited<ReturnType<FetchLike>>;
      let body: string;
      try {
        res = await fetchImpl(location.url);
        body = res.ok ? await res.text() : '';
      } catch (e) {
        throw new ContentResolutionError(`Cannot fetch ${location.url}: ${getErrorMessage(e)}`, { cause: e });
      }
      if (!res.ok) throw new ContentResolutionError(`Cannot fetch ${location.url}: HTTP ${res.status}`);
      return stripFrontMatter(location.url, body);
    }
  }
}
