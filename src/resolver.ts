/**
 * PostParseResolver - fix-ups that need the complete graph
 */

import { ParseSession } from './context';
import { GedcomDatabase } from './database';
import { Logger } from './logger';
import { FamilyLink, FamilyRecord, IndividualRecord, NoteRecord, RepositoryRecord, SourceRecord } from './records';

export interface ResolutionReport {
  /** Referenced ids with no record behind them, in order of first use. */
  missingReferences: string[];
}

export class PostParseResolver {
  private readonly session: ParseSession;
  private readonly logger: Logger;

  constructor(session: ParseSession, logger: Logger) {
    this.session = session;
    this.logger = logger;
  }

  private get database(): GedcomDatabase {
    return this.session.database;
  }

  resolve(): ResolutionReport {
    this.fixHeader();
    for (const family of this.database.families) {
      this.relinkFamily(family);
    }
    const missingReferences = this.auditReferences();
    this.linkCitations();
    this.backfillSourceTitles();
    return { missingReferences };
  }

  // ==========================================================================
  // Header
  // ==========================================================================

  /** A note filed on the header is its content description. */
  private fixHeader(): void {
    const header = this.database.header;
    if (!header) {
      return;
    }
    const first = header.notes[0];
    const note = first === undefined ? undefined : this.database.get(first);
    if (first !== undefined && note instanceof NoteRecord) {
      this.database.remove(first);
      this.session.removedNotes.add(first);
      header.notes.shift();
      note.level = 1;
      note.xrefId = '';
      header.contentDescription = note;
    }
    if (!header.applicationName && header.applicationSystemId) {
      header.applicationName = header.applicationSystemId;
    }
  }

  // ==========================================================================
  // Families
  // ==========================================================================

  private relinkFamily(family: FamilyRecord): void {
    for (const spouseId of [family.husband, family.wife]) {
      const spouse = this.individual(spouseId, family);
      if (spouse && !spouse.spouseInFamily(family.xrefId)) {
        const link = this.createLink(spouse, family, 'spouse');
        link.preferredSpouse = spouse.spouseIn.length === 0;
        spouse.spouseIn.push(link);
      }
    }

    for (const childId of family.children) {
      const child = this.individual(childId, family);
      if (!child) {
        continue;
      }
      let link = child.childInFamily(family.xrefId);
      if (!link) {
        link = this.createLink(child, family, 'child');
        child.childIn.push(link);
      }
      this.classifyPedigree(family, child, link);
    }

    family.clearLinkageTypes();
  }

  /**
   * Later steps win: family level markers, then a birth event naming this
   * family, then an adoption event naming it.
   */
  private classifyPedigree(family: FamilyRecord, child: IndividualRecord, link: FamilyLink): void {
    link.pedigree = family.getLinkage(child.xrefId) ?? link.pedigree;
    link.fatherPedigree = family.getHusbandLinkage(child.xrefId) ?? link.fatherPedigree;
    link.motherPedigree = family.getWifeLinkage(child.xrefId) ?? link.motherPedigree;

    const events = child.events.filter(event => event.famc === family.xrefId);
    if (events.some(event => event.eventType === 'BIRT')) {
      link.pedigree = 'birth';
    }
    for (const adoption of events.filter(event => event.eventType === 'ADOP')) {
      if (adoption.adoptedBy === 'husband') {
        link.fatherPedigree = 'adopted';
      } else if (adoption.adoptedBy === 'wife') {
        link.motherPedigree = 'adopted';
      } else {
        link.pedigree = 'adopted';
      }
    }
  }

  private individual(xrefId: string, family: FamilyRecord): IndividualRecord | undefined {
    if (!xrefId) {
      return undefined;
    }
    const record = this.database.get(xrefId);
    if (record && !(record instanceof IndividualRecord)) {
      this.logger.warn(`Family member is a ${record.recordType}, not an individual`, {
        family: family.xrefId,
        xrefId,
      });
      return undefined;
    }
    return record;
  }

  private createLink(individual: IndividualRecord, family: FamilyRecord, role: 'child' | 'spouse'): FamilyLink {
    const link = new FamilyLink(individual.xrefId, family.xrefId, role);
    link.level = 1;
    link.database = this.database;
    return link;
  }

  // ==========================================================================
  // References
  // ==========================================================================

  private auditReferences(): string[] {
    const missing = new Set<string>();
    for (const xrefId of this.session.referencedIds) {
      const record = this.database.get(xrefId);
      if (record) {
        if (!(record instanceof IndividualRecord) && !(record instanceof FamilyRecord)) {
          record.refCount += 1;
        }
      } else if (!this.session.removedNotes.has(xrefId) && !missing.has(xrefId)) {
        missing.add(xrefId);
        this.logger.warn('Missing reference', { xrefId });
      }
    }
    return [...missing];
  }

  private linkCitations(): void {
    for (const citation of this.session.sourceCitations) {
      const source = this.database.get(citation.source);
      if (source instanceof SourceRecord) {
        source.citations.push(citation);
      } else {
        this.logger.warn('Source citation names no source record', { xrefId: citation.source });
      }
    }
    for (const citation of this.session.repositoryCitations) {
      const repository = this.database.get(citation.repository);
      if (repository instanceof RepositoryRecord) {
        repository.citations.push(citation);
      } else {
        this.logger.warn('Repository citation names no repository record', { xrefId: citation.repository });
      }
    }
  }

  private backfillSourceTitles(): void {
    let untitled = 0;
    for (const source of this.database.sources) {
      if (!source.title) {
        untitled += 1;
        source.title = `Source ${untitled}`;
      }
    }
  }
}
