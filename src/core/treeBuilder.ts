/**
 * Tree builder: pages through a provider's flat listing for a target type and
 * links the records into a NodeTree by their declared parent ids.
 */

import type { AdProvider } from "../adapters/base.js";
import type { HierarchyRecord, NodeTree, TreeNode } from "../types/inventory.js";
import { DEFAULT_PAGE_SIZE, TARGET_TYPE_SOURCES, type ProviderId, type TargetType } from "./constants.js";
import { ValidationError } from "./errors.js";
import { createChildLogger, type Logger } from "./logger.js";
import type { Guard } from "./timeout.js";

/**
 * Link flat records into roots and orphans.
 *
 * A record with no parent is a root. A record whose parent is not in the listing
 * becomes an orphan root and gets a warning. Children are attached top-down, so a
 * node has one parent and no cycles; records never reached that way (a cycle
 * upstream) and repeated ids are dropped with a warning.
 */
export function assembleTree(targetType: TargetType, records: readonly HierarchyRecord[]): NodeTree {
  const warnings: string[] = [];
  const nodes = new Map<string, TreeNode>();

  for (const record of records) {
    if (nodes.has(record.id)) {
      warnings.push(`Dropped duplicate ${record.entityType} ${record.id}`);
      continue;
    }
    nodes.set(record.id, {
      id: record.id,
      parentId: record.parentId,
      entityType: record.entityType,
      name: record.name,
      data: record.data,
      children: [],
    });
  }

  const roots: TreeNode[] = [];
  const orphans: TreeNode[] = [];
  const childrenOf = new Map<string, TreeNode[]>();

  for (const node of nodes.values()) {
    if (node.parentId == null) {
      roots.push(node);
    } else if (!nodes.has(node.parentId)) {
      orphans.push(node);
      warnings.push(`Orphaned ${node.entityType} ${node.id}: parent ${node.parentId} is not in the listing`);
    } else {
      const siblings = childrenOf.get(node.parentId);
      if (siblings) siblings.push(node);
      else childrenOf.set(node.parentId, [node]);
    }
  }

  const reached = new Set<string>();
  const pending = [...roots, ...orphans];
  while (pending.length > 0) {
    const node = pending.pop();
    if (!node || reached.has(node.id)) continue;
    reached.add(node.id);
    for (const child of childrenOf.get(node.id) ?? []) {
      node.children.push(child);
      pending.push(child);
    }
  }

  for (const node of nodes.values()) {
    if (!reached.has(node.id)) {
      warnings.push(`Dropped ${node.entityType} ${node.id}: unreachable from any root (parent cycle)`);
    }
  }

  return { targetType, roots, orphans, size: reached.size, warnings };
}

export interface TreeBuilderOptions {
  guard: Guard;
  pageSize?: number;
  logger?: Logger;
}

export class TreeBuilder {
  private readonly guard: Guard;
  private readonly pageSize: number;
  private readonly log: Logger;

  constructor(
    readonly providerId: ProviderId,
    private readonly provider: AdProvider,
    options: TreeBuilderOptions
  ) {
    this.guard = options.guard;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.log = options.logger ?? createChildLogger("treeBuilder");
  }

  /** Fetch every record of `targetType` afresh and build its tree. */
  async constructTree(targetType: TargetType): Promise<NodeTree> {
    const sources = TARGET_TYPE_SOURCES[targetType];
    if (!sources) {
      throw new ValidationError(`Unknown target type: ${String(targetType)}`);
    }

    const records: HierarchyRecord[] = [];
    for (const entityType of sources) {
      let offset = 0;
      while (true) {
        const page = await this.guard(`getHierarchyPage:${entityType}`, () =>
          this.provider.getHierarchyPage(entityType, { limit: this.pageSize, offset })
        );
        records.push(...page);

        if (page.length < this.pageSize) {
          break;
        }
        offset += this.pageSize;
      }
    }

    const tree = assembleTree(targetType, records);
    for (const warning of tree.warnings) {
      this.log.warn({ provider: this.providerId, targetType }, warning);
    }
    this.log.debug(
      { provider: this.providerId, targetType, fetched: records.length, size: tree.size },
      "Constructed tree"
    );
    return tree;
  }
}
