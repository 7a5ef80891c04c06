import { ProvisionError, StepTimeoutError, TeardownError, causedByTimeout, errorMessage, toErrorInfo } from "./errors.js";
import type { ClusterResourceSpec, ResourceSpec, ToolResourceSpec } from "../types/pipeline.js";
import type { TeardownReport } from "../types/job.js";

/** An external dependency with an explicit acquire/release lifecycle. */
export type ProvisionedResource = Readonly<{
  id: string;
  kind: ResourceSpec["kind"];
  name: string;
  /** Variables made visible to later steps (e.g. KUBECONFIG, PATH). */
  exports: Readonly<Record<string, string>>;
  details: Readonly<Record<string, string>>;
}>;

/** What a provider may look at while acquiring. */
export type ProvisionContext = {
  runId: string;
  jobSlug: string;
  workdir: string;
  jobDir: string;
  env: Readonly<Record<string, string>>;
  signal: AbortSignal;
};

export interface ResourceProvider<S extends ResourceSpec> {
  readonly kind: S["kind"];
  acquire(spec: S, ctx: ProvisionContext): Promise<ProvisionedResource>;
  release(resource: ProvisionedResource): Promise<void>;
}

export type ProviderRegistry = {
  tool?: ResourceProvider<ToolResourceSpec>;
  cluster?: ResourceProvider<ClusterResourceSpec>;
};

type Held = {
  resource: ProvisionedResource;
  release: () => Promise<void>;
};

/**
 * Scoped acquisition for one job.
 *
 * Every resource acquired through the scope is released by `releaseAll()`,
 * in reverse order of acquisition and exactly once, including resources whose
 * acquisition completed after the scope gave up waiting on them.
 */
export class ResourceScope {
  private readonly held: Held[] = [];
  private readonly inflight = new Set<Promise<void>>();
  private releasing: Promise<TeardownReport[]> | null = null;

  constructor(
    private readonly providers: ProviderRegistry,
    private readonly timeoutMs: number,
  ) {}

  /** Resources currently held, in acquisition order. */
  get acquired(): ProvisionedResource[] {
    return this.held.map((h) => h.resource);
  }

  async acquire(spec: ResourceSpec, ctx: ProvisionContext): Promise<ProvisionedResource> {
    if (this.releasing) {
      throw new ProvisionError(spec.name, `Cannot acquire ${spec.kind} "${spec.name}": scope already released`);
    }

    const controller = new AbortController();
    const onJobAbort = () => controller.abort(new Error("cancelled"));
    if (ctx.signal.aborted) onJobAbort();
    else ctx.signal.addEventListener("abort", onJobAbort, { once: true });

    const timer =
      this.timeoutMs > 0
        ? setTimeout(() => controller.abort(new StepTimeoutError(`Acquiring ${spec.kind} "${spec.name}"`, this.timeoutMs)), this.timeoutMs)
        : null;

    const attempt = this.start(spec, { ...ctx, signal: controller.signal });
    // Settled marker for releaseAll(); the failure itself is reported below.
    const settled = attempt.then(
      () => undefined,
      () => undefined,
    );
    this.inflight.add(settled);

    const aborted = new Promise<never>((_, reject) => {
      const fail = () => reject(controller.signal.reason);
      if (controller.signal.aborted) fail();
      else controller.signal.addEventListener("abort", fail, { once: true });
    });

    try {
      return await Promise.race([attempt, aborted]);
    } catch (e: unknown) {
      if (e instanceof ProvisionError) throw e;
      throw new ProvisionError(spec.name, `Failed to acquire ${spec.kind} "${spec.name}": ${errorMessage(e)}`, {
        cause: e,
        timedOut: causedByTimeout(e),
      });
    } finally {
      if (timer) clearTimeout(timer);
      ctx.signal.removeEventListener("abort", onJobAbort);
    }
  }

  /** Release everything once. Later calls return the same reports. */
  releaseAll(): Promise<TeardownReport[]> {
    if (!this.releasing) {
      this.releasing = this.drain();
    }
    return this.releasing;
  }

  private start(spec: ResourceSpec, ctx: ProvisionContext): Promise<ProvisionedResource> {
    switch (spec.kind) {
      case "tool": {
        const provider = this.providers.tool;
        if (!provider) return Promise.reject(new ProvisionError(spec.name, `No provider for resource kind "tool"`));
        return provider.acquire(spec, ctx).then((resource) => this.hold(resource, provider));
      }
      case "cluster": {
        const provider = this.providers.cluster;
        if (!provider) return Promise.reject(new ProvisionError(spec.name, `No provider for resource kind "cluster"`));
        return provider.acquire(spec, ctx).then((resource) => this.hold(resource, provider));
      }
    }
  }

  private hold<S extends ResourceSpec>(resource: ProvisionedResource, provider: ResourceProvider<S>): ProvisionedResource {
    let released = false;
    this.held.push({
      resource,
      release: async () => {
        if (released) return;
        released = true;
        await provider.release(resource);
      },
    });
    return resource;
  }

  private async drain(): Promise<TeardownReport[]> {
    await Promise.all([...this.inflight]);

    const reports: TeardownReport[] = [];
    for (let entry = this.held.pop(); entry !== undefined; entry = this.held.pop()) {
      const { resource } = entry;
      try {
        await entry.release();
        reports.push({ id: resource.id, kind: resource.kind, name: resource.name, ok: true });
      } catch (e: unknown) {
        const err = new TeardownError(`Releasing ${resource.kind} "${resource.name}"`, errorMessage(e), { cause: e });
        reports.push({ id: resource.id, kind: resource.kind, name: resource.name, ok: false, error: toErrorInfo(err) });
      }
    }
    return reports;
  }
}

/** Render `${{ }}` placeholders in every string field of a resource spec. */
export function renderResourceSpec(spec: ResourceSpec, render: (value: string) => string): ResourceSpec {
  switch (spec.kind) {
    case "tool":
      return {
        ...spec,
        name: render(spec.name),
        url: render(spec.url),
        ...(spec.path_in_archive !== undefined ? { path_in_archive: render(spec.path_in_archive) } : {}),
      };
    case "cluster":
      return {
        ...spec,
        name: render(spec.name),
        ...(spec.config !== undefined ? { config: render(spec.config) } : {}),
        ...(spec.node_ip ? { node_ip: { interface: render(spec.node_ip.interface), env: spec.node_ip.env } } : {}),
      };
  }
}
