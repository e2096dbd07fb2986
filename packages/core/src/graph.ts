import { injectable } from 'inversify';
import { DerivedState, Issue } from './types';
import { BrdError } from './errors';
import { appendUnique, sortIssues } from './utils';

export type IssueMap = ReadonlyMap<string, Issue>;

export interface IGraphService {
  computeDerived(issue: Issue, issues: IssueMap): DerivedState;
  getReadyIssues(issues: IssueMap): Issue[];
  getBlockedIssues(issues: IssueMap): Issue[];
  getDependents(id: string, issues: IssueMap): string[];
  findCycles(issues: IssueMap): string[][];
  wouldCreateCycle(childId: string, parentId: string, issues: IssueMap): string[] | null;
  addDependency(childId: string, parentId: string, issues: IssueMap): Issue | null;
  removeDependency(childId: string, parentId: string, issues: IssueMap): Issue | null;
  propagateResults(doneId: string, resultIds: string[], issues: IssueMap): Issue[];
}

/**
 * Dependency graph queries over an in-memory store. Methods never mutate
 * the issues passed in; changed issues come back as new objects.
 */
@injectable()
export class GraphService implements IGraphService {
  computeDerived(issue: Issue, issues: IssueMap): DerivedState {
    const openDeps: string[] = [];
    const missingDeps: string[] = [];
    for (const depId of issue.deps) {
      const dep = issues.get(depId);
      if (!dep) {
        missingDeps.push(depId);
      } else if (dep.status !== 'done') {
        openDeps.push(depId);
      }
    }
    const unresolved = openDeps.length > 0 || missingDeps.length > 0;
    return {
      is_ready: issue.status === 'open' && !unresolved,
      open_deps: openDeps,
      missing_deps: missingDeps,
      is_blocked: issue.status === 'open' && unresolved,
    };
  }

  getReadyIssues(issues: IssueMap): Issue[] {
    return sortIssues([...issues.values()].filter(issue => this.computeDerived(issue, issues).is_ready));
  }

  getBlockedIssues(issues: IssueMap): Issue[] {
    return sortIssues([...issues.values()].filter(issue => this.computeDerived(issue, issues).is_blocked));
  }

  getDependents(id: string, issues: IssueMap): string[] {
    return [...issues.values()]
      .filter(issue => issue.deps.includes(id))
      .map(issue => issue.id)
      .sort();
  }

  /**
   * Every cycle reachable from each unvisited root, as a closed path
   * (first id repeated at the end). The same cycle may appear more than
   * once when reached from different starts.
   */
  findCycles(issues: IssueMap): string[][] {
    const cycles: string[][] = [];
    const visited = new Set<string>();
    const onStack = new Set<string>();
    const stack: string[] = [];

    const visit = (id: string): void => {
      visited.add(id);
      onStack.add(id);
      stack.push(id);

      for (const depId of issues.get(id)?.deps ?? []) {
        if (!issues.has(depId)) continue;
        if (onStack.has(depId)) {
          const start = stack.indexOf(depId);
          cycles.push([...stack.slice(start), depId]);
        } else if (!visited.has(depId)) {
          visit(depId);
        }
      }

      stack.pop();
      onStack.delete(id);
    };

    for (const id of [...issues.keys()].sort()) {
      if (!visited.has(id)) visit(id);
    }
    return cycles;
  }

  /**
   * Path demonstrating the cycle that `child -> parent` would close, or null.
   */
  wouldCreateCycle(childId: string, parentId: string, issues: IssueMap): string[] | null {
    if (childId === parentId) return [childId, parentId];

    const path = [childId, parentId];
    const visited = new Set<string>();

    const canReach = (from: string): boolean => {
      if (from === childId) return true;
      if (visited.has(from)) return false;
      visited.add(from);
      for (const depId of issues.get(from)?.deps ?? []) {
        path.push(depId);
        if (canReach(depId)) return true;
        path.pop();
      }
      return false;
    };

    return canReach(parentId) ? path : null;
  }

  addDependency(childId: string, parentId: string, issues: IssueMap): Issue | null {
    if (childId === parentId) {
      throw BrdError.other('cannot add self-dependency');
    }
    const child = issues.get(childId);
    if (!child) throw BrdError.notFound(childId);
    if (!issues.has(parentId)) throw BrdError.notFound(parentId);
    if (child.deps.includes(parentId)) return null;

    const cycle = this.wouldCreateCycle(childId, parentId, issues);
    if (cycle) throw BrdError.cycle(cycle);

    return { ...child, deps: [...child.deps, parentId] };
  }

  removeDependency(childId: string, parentId: string, issues: IssueMap): Issue | null {
    const child = issues.get(childId);
    if (!child) throw BrdError.notFound(childId);
    if (!child.deps.includes(parentId)) return null;
    return { ...child, deps: child.deps.filter(depId => depId !== parentId) };
  }

  /**
   * Completion of `doneId` with result issues: each result inherits the
   * finished issue's deps, and every dependent of the finished issue gains
   * the results as deps. Results are parallel outputs: a result that already
   * depends on the finished issue is not linked to the other results. Any
   * edge that would close a cycle aborts the whole propagation.
   */
  propagateResults(doneId: string, resultIds: string[], issues: IssueMap): Issue[] {
    const done = issues.get(doneId);
    if (!done) throw BrdError.notFound(doneId);
    const results = appendUnique([], ...resultIds);

    const working = new Map(issues);
    const touched = new Map<string, Issue>();
    const link = (childId: string, parentId: string): void => {
      if (childId === parentId) return;
      const updated = this.addDependency(childId, parentId, working);
      if (updated) {
        working.set(updated.id, updated);
        touched.set(updated.id, updated);
      }
    };

    for (const resultId of results) {
      for (const depId of done.deps) {
        if (working.has(depId)) link(resultId, depId);
      }
    }

    for (const dependentId of this.getDependents(doneId, issues)) {
      if (results.includes(dependentId)) continue;
      for (const resultId of results) {
        link(dependentId, resultId);
      }
    }

    return [...touched.values()];
  }
}
