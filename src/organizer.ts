import type {
  Contact,
  ContactGateway,
  DuplicateAnalysis,
  DuplicateGroup,
  MergePlan,
  MergeValueOption,
} from './types/index.js';
import {
  analyzeDuplicates,
  displayName,
  findDuplicates,
  initialMergePlan,
  mergeConfiguration,
  mergedContact,
  primaryContact,
  setEmailAddressSelected,
  setPhoneNumberSelected,
  uniqueValues,
  type DedupOptions,
} from './contacts/index.js';
import { ActionExecutor, actionTitle, type ActionResult, type CleanupAction } from './actions/index.js';
import { UndoManager, type HistoryStepResult, type UndoHistory } from './undo/index.js';
import { RefreshStateMachine } from './refresh/refresh-state-machine.js';
import { DuplicateGroupNotFoundError, MergeError, logger } from './utils/index.js';

export interface OrganizerOptions {
  undoManager?: UndoManager;
  refresh?: RefreshStateMachine;
  detection?: DedupOptions;
  autoRefresh?: boolean;
}

export interface AnalysisResult {
  groups: DuplicateGroup[];
  analysis: DuplicateAnalysis;
  totalContacts: number;
}

export interface MergeReview {
  group: DuplicateGroup;
  plan: MergePlan;
  phoneNumbers: MergeValueOption[];
  emailAddresses: MergeValueOption[];
}

/** Choices made during a merge review. Anything omitted keeps the initial plan. */
export interface MergeSelections {
  primaryContactId?: string;
  preferredNameContactId?: string;
  preferredOrganizationContactId?: string;
  preferredPhotoContactId?: string;
  excludedPhoneNumbers?: string[];
  excludedEmailAddresses?: string[];
}

export interface MergeOutcome {
  contact: Contact;
  deletedContactIds: string[];
  description: string;
}

/**
 * Ties detection, merging, cleanup actions and undo history to one contact store.
 * Duplicate groups from the last analysis are cached by id until merged or re-analyzed.
 */
export class ContactOrganizer {
  readonly undoManager: UndoManager;
  private readonly refresh: RefreshStateMachine;
  private readonly executor: ActionExecutor;
  private readonly detection: DedupOptions;
  private readonly autoRefresh: boolean;
  private groups = new Map<string, DuplicateGroup>();
  private latest: AnalysisResult | undefined;
  private loading = false;

  constructor(private readonly gateway: ContactGateway, options: OrganizerOptions = {}) {
    this.undoManager = options.undoManager ?? new UndoManager();
    this.refresh = options.refresh ?? new RefreshStateMachine();
    this.detection = options.detection ?? {};
    this.autoRefresh = options.autoRefresh ?? true;
    this.executor = new ActionExecutor(gateway);
  }

  /** Groups from the last completed analysis. */
  get lastAnalysis(): AnalysisResult | undefined {
    return this.latest;
  }

  /**
   * Run duplicate detection over the current store contents.
   * A request made while an analysis is running is folded into one re-run
   * after it; the caller gets the previous result in that case.
   */
  async analyze(): Promise<AnalysisResult | undefined> {
    if (!this.refresh.prepareForLoad({ isLoading: this.loading, isAnalyzing: this.loading })) {
      logger.debug('Analysis already running, refresh queued');
      return this.latest;
    }
    return this.load();
  }

  /**
   * An automatic trigger, such as a store change. Refreshes an existing analysis;
   * ignored when auto-refresh is off or nothing has been analyzed yet.
   */
  async notifyChanged(): Promise<AnalysisResult | undefined> {
    if (!this.latest) return undefined;
    const start = this.refresh.handleTrigger({
      autoRefreshEnabled: this.autoRefresh,
      isLoading: this.loading,
      isAnalyzing: this.loading,
    });
    return start ? this.load() : this.latest;
  }

  private async load(): Promise<AnalysisResult> {
    this.loading = true;
    try {
      let result = await this.detect();
      while (this.refresh.consumePendingRefresh()) {
        result = await this.detect();
      }
      return result;
    } finally {
      this.loading = false;
    }
  }

  private async detect(): Promise<AnalysisResult> {
    const records = await this.gateway.records();
    const groups = findDuplicates(records, this.detection);
    this.groups = new Map(groups.map(g => [g.id, g]));
    this.latest = { groups, analysis: analyzeDuplicates(groups), totalContacts: records.length };
    return this.latest;
  }

  getGroup(groupId: string): DuplicateGroup {
    const group = this.groups.get(groupId);
    if (!group) throw new DuplicateGroupNotFoundError(groupId);
    return group;
  }

  planMerge(groupId: string): MergeReview {
    const group = this.getGroup(groupId);
    return {
      group,
      plan: initialMergePlan(group),
      phoneNumbers: uniqueValues(group.contacts, 'phoneNumbers'),
      emailAddresses: uniqueValues(group.contacts, 'emailAddresses'),
    };
  }

  /**
   * Merge a cached group into its primary contact and record the merge for undo.
   * Undo writes every participant back as it was; redo applies the same merge again.
   */
  async mergeGroup(groupId: string, selections: MergeSelections = {}): Promise<MergeOutcome> {
    const group = this.getGroup(groupId);
    const memberIds = new Set(group.contacts.map(c => c.id));
    const plan = initialMergePlan(group);

    const member = (id: string | undefined, role: string): string | undefined => {
      if (id === undefined) return undefined;
      if (!memberIds.has(id)) throw new MergeError(`${role} contact ${id} is not a member of group ${groupId}`);
      return id;
    };

    plan.preferredNameContactId = member(selections.preferredNameContactId, 'Name') ?? plan.preferredNameContactId;
    plan.preferredOrganizationContactId = member(selections.preferredOrganizationContactId, 'Organization')
      ?? plan.preferredOrganizationContactId;
    plan.preferredPhotoContactId = member(selections.preferredPhotoContactId, 'Photo');
    for (const value of selections.excludedPhoneNumbers ?? []) setPhoneNumberSelected(plan, value, false);
    for (const value of selections.excludedEmailAddresses ?? []) setEmailAddressSelected(plan, value, false);

    const primaryId = selections.primaryContactId ?? primaryContact(group).id;
    const configuration = mergeConfiguration(plan, primaryId, group);

    const snapshots = await Promise.all(configuration.mergingContactIds.map(id => this.gateway.get(id)));
    const destination = snapshots.find(c => c.id === primaryId);
    if (!destination) throw new MergeError(`Primary contact ${primaryId} could not be loaded`);
    const sources = snapshots.filter(c => c.id !== primaryId);

    const merged = mergedContact(configuration, destination, sources);
    await this.gateway.applyMerge(merged.contact, merged.deletedContactIds);

    const description = `Merge ${snapshots.length} contacts into ${displayName(merged.contact)}`;
    await this.undoManager.register(
      description,
      async () => {
        await this.gateway.restore(snapshots, []);
        return true;
      },
      async () => {
        await this.gateway.applyMerge(merged.contact, merged.deletedContactIds);
        return true;
      },
    );

    this.groups.delete(groupId);
    if (this.latest) {
      const groups = this.latest.groups.filter(g => g.id !== groupId);
      this.latest = { ...this.latest, groups, analysis: analyzeDuplicates(groups) };
    }

    logger.info(description);
    return { contact: merged.contact, deletedContactIds: merged.deletedContactIds, description };
  }

  /** Run a cleanup action on one contact; a successful one becomes undoable. */
  async performAction(action: CleanupAction, contactId: string, input?: string): Promise<ActionResult> {
    const result = await this.executor.execute(action, contactId, input);
    if (result.effect) {
      await this.undoManager.registerEffect(result.effect, actionTitle(action), this.gateway);
    }
    return result;
  }

  undo(): Promise<HistoryStepResult> {
    return this.undoManager.undo();
  }

  redo(): Promise<HistoryStepResult> {
    return this.undoManager.redo();
  }

  async history(): Promise<UndoHistory> {
    await this.undoManager.waitForIdle();
    return this.undoManager.history();
  }
}
