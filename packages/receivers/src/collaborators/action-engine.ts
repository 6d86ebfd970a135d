/**
 * Action engine port and its in-process stand-in.
 *
 * Submission is the whole contract: the engine either accepts an action
 * and returns a handle immediately, or refuses it. Execution, per-cluster
 * serialization and completion reporting all happen inside the engine.
 */

import { randomUUID } from "node:crypto";
import type { ActionHandle, ActionRequest } from "@clusterhook/types";

export interface ActionEngine {
  /**
   * @throws ActionRejectedError if the engine refuses the submission
   */
  submit(request: ActionRequest): Promise<ActionHandle>;
}

export type ActionRejectionReason =
  | "CLUSTER_NOT_FOUND"
  | "CLUSTER_BUSY"
  | "ACTION_NOT_SUPPORTED";

export class ActionRejectedError extends Error {
  constructor(
    public readonly reason: ActionRejectionReason,
    message: string,
  ) {
    super(message);
    this.name = "ActionRejectedError";
  }
}

export interface InMemoryActionEngineOptions {
  /** Target clusters the engine knows. Unset: every cluster is known. */
  readonly knownClusters?: ((clusterId: string) => boolean) | undefined;
  /** Return a reason to refuse a submission */
  readonly rejectWhen?:
    | ((request: ActionRequest) => ActionRejectionReason | undefined)
    | undefined;
}

export class InMemoryActionEngine implements ActionEngine {
  private readonly _submissions: { request: ActionRequest; handle: ActionHandle }[] = [];
  private readonly _knownClusters: ((clusterId: string) => boolean) | undefined;
  private _rejectWhen: ((request: ActionRequest) => ActionRejectionReason | undefined) | undefined;

  constructor(options: InMemoryActionEngineOptions = {}) {
    this._knownClusters = options.knownClusters;
    this._rejectWhen = options.rejectWhen;
  }

  async submit(request: ActionRequest): Promise<ActionHandle> {
    if (this._knownClusters !== undefined && !this._knownClusters(request.clusterId)) {
      throw new ActionRejectedError(
        "CLUSTER_NOT_FOUND",
        `Cluster '${request.clusterId}' not found`,
      );
    }

    const reason = this._rejectWhen?.(request);
    if (reason !== undefined) {
      throw new ActionRejectedError(
        reason,
        `Action ${request.action} on cluster '${request.clusterId}' refused: ${reason}`,
      );
    }

    const handle: ActionHandle = {
      id: randomUUID(),
      action: request.action,
      target: request.clusterId,
      status: "READY",
      createdAt: new Date().toISOString(),
    };
    this._submissions.push({ request, handle });
    return handle;
  }

  rejectWhen(predicate: ((request: ActionRequest) => ActionRejectionReason | undefined) | undefined): void {
    this._rejectWhen = predicate;
  }

  get submissions(): readonly { readonly request: ActionRequest; readonly handle: ActionHandle }[] {
    return this._submissions;
  }
}
