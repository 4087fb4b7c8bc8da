import type { IdentifierDomain, Mismatch, ReferenceSets } from './types'

export type ReconcileCandidate = {
  sequenceKey: string
  identifier: string
}

export function identifierDomain(identifier: string, secondaryPrefix: string): IdentifierDomain {
  return secondaryPrefix && identifier.startsWith(secondaryPrefix) ? 'secondary' : 'task'
}

/**
 * Each identifier is looked up only in the set of its own domain, so an EO
 * number that happens to equal a task number is still reported when the EO
 * set lacks it. Empty identifiers are left to the data-quality diagnostics.
 */
export function reconcileIdentifiers(
  candidates: ReconcileCandidate[],
  reference: ReferenceSets,
  secondaryPrefix: string
): Mismatch[] {
  const out: Mismatch[] = []
  for (const c of candidates){
    if (!c.identifier) continue
    const domain = identifierDomain(c.identifier, secondaryPrefix)
    const known = domain === 'secondary' ? reference.secondaryIds : reference.taskIds
    if (!known.has(c.identifier)) out.push({ sequenceKey: c.sequenceKey, identifier: c.identifier, domain })
  }
  return out
}

export function emptyReferenceSets(): ReferenceSets {
  return { taskIds: new Set(), secondaryIds: new Set() }
}
