/**
 * bpfledger - Repository input type definitions
 *
 * Create types strip the timestamps the repository assigns. Identifiers are
 * supplied by the caller because the kernel assigns them.
 */

import type { BpfMap, KernelInfo, Link, Program } from './entities.js';

// ============================================================
// Create input types
// ============================================================

/** Input for creating a new Program. JSON columns and state have defaults. */
export type CreateProgramInput = Omit<
  Program,
  'createdAt' | 'updatedAt' | 'state' | 'metadata' | 'globalData' | 'kernelMapIds'
> &
  Partial<Pick<Program, 'state' | 'metadata' | 'globalData' | 'kernelMapIds'>>;

/** Input for creating a new Link. */
export type CreateLinkInput = Omit<Link, 'createdAt' | 'updatedAt'>;

/** Input for creating a new Map. */
export type CreateMapInput = Omit<BpfMap, 'createdAt' | 'updatedAt'>;

// ============================================================
// Lifecycle input types (identifier supplied separately by the kernel)
// ============================================================

/** Link descriptor for attachLink(); the link id comes from the kernel. */
export type AttachLinkInput = Pick<Link, 'linkType' | 'target'>;

/** Map descriptor for attachMap(); the map id comes from the kernel. */
export type AttachMapInput = Omit<CreateMapInput, 'id'>;

/** Introspection refresh for recordKernelInfo(). */
export type KernelInfoInput = Partial<KernelInfo>;
