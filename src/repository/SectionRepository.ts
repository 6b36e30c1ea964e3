import { createStore } from 'zustand/vanilla';
import { withPluginData } from '../domain/section';
import type { Section, SectionId } from '../domain/section';
import { MissingSection, SectionIdAlreadyExists } from '../errors';
import type { RepositoryObserver, SectionRepositoryEvent, Unsubscribe } from './types';

interface SectionRepositoryState {
  sections: ReadonlyMap<SectionId, Section>;
  lastChange: SectionRepositoryEvent | null;
}

export class SectionRepository {
  private readonly store = createStore<SectionRepositoryState>()(() => ({
    sections: new Map(),
    lastChange: null,
  }));

  register(observer: RepositoryObserver<SectionRepositoryEvent>): Unsubscribe {
    return this.store.subscribe(state => {
      if (state.lastChange) observer(state.lastChange);
    });
  }

  add(section: Section): void {
    this.addAll([section]);
  }

  addAll(sections: Iterable<Section>): void {
    const current = this.store.getState().sections;
    const next = new Map(current);
    const added: SectionId[] = [];
    for (const section of sections) {
      if (next.has(section.id)) {
        throw new SectionIdAlreadyExists(section.id);
      }
      next.set(section.id, section);
      added.push(section.id);
    }
    this.store.setState({ sections: next, lastChange: { added, removed: [], changed: [] } });
  }

  get(id: SectionId): Section | undefined {
    return this.store.getState().sections.get(id);
  }

  /** Sections in insertion order */
  getAll(): Section[] {
    return [...this.store.getState().sections.values()];
  }

  getSectionIds(): Set<SectionId> {
    return new Set(this.store.getState().sections.keys());
  }

  update(section: Section): void {
    const sections = this.store.getState().sections;
    if (!sections.has(section.id)) {
      throw new MissingSection(section.id);
    }
    const next = new Map(sections);
    next.set(section.id, section);
    this.store.setState({ sections: next, lastChange: { added: [], removed: [], changed: [section.id] } });
  }

  /** Merges `value` into the plugin data stored under `key` */
  updatePluginData(key: string, sectionId: SectionId, value: Readonly<Record<string, unknown>>): void {
    const section = this.get(sectionId);
    if (!section) {
      throw new MissingSection(sectionId);
    }
    const existing = section.pluginData[key];
    const merged = isRecord(existing) ? { ...existing, ...value } : { ...value };
    this.update(withPluginData(section, { ...section.pluginData, [key]: merged }));
  }

  remove(id: SectionId): void {
    const sections = this.store.getState().sections;
    if (!sections.has(id)) {
      throw new MissingSection(id);
    }
    const next = new Map(sections);
    next.delete(id);
    this.store.setState({ sections: next, lastChange: { added: [], removed: [id], changed: [] } });
  }

  clear(): void {
    const removed = [...this.getSectionIds()];
    this.store.setState({ sections: new Map(), lastChange: { added: [], removed, changed: [] } });
  }

  isEmpty(): boolean {
    return this.store.getState().sections.size === 0;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
