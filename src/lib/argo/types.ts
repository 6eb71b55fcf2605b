export const APPLICATION_API_VERSION = 'argoproj.io/v1alpha1';
export const APPLICATION_KIND = 'Application';

export interface EnvVar {
  readonly name: string;
  readonly value: string;
}

/**
 * One child application, resolved from an Argo CD Application manifest.
 */
export interface ApplicationDescriptor {
  readonly name: string;
  /** Empty when neither the label nor the plugin env set it. */
  readonly instance: string;
  readonly env: string;
  readonly repoURL: string;
  readonly path: string;
  readonly targetRevision: string;
  /** Plugin env entries not consumed as instance, env or values files. */
  readonly pluginEnv: readonly EnvVar[];
  /** Relative to `path`, ordered by their WERF_VALUES_<n> index. */
  readonly valuesFiles: readonly string[];
  readonly setters: ReadonlyMap<string, string>;
}

/**
 * Shape of the Application manifest fields the resolver reads.
 */
export interface RawApplication {
  apiVersion: string;
  kind: string;
  metadata: {
    name: string;
    labels: Record<string, string>;
    annotations: Record<string, string>;
  };
  spec: {
    source: {
      repoURL: string;
      targetRevision: string;
      path: string;
      plugin?: {
        env: EnvVar[];
      };
    };
  };
}

function sameEntries<T>(a: readonly T[], b: readonly T[], eq: (x: T, y: T) => boolean): boolean {
  return a.length === b.length && a.every((item, i) => eq(item, b[i]));
}

export function descriptorsEqual(a: ApplicationDescriptor, b: ApplicationDescriptor): boolean {
  if (
    a.name !== b.name ||
    a.instance !== b.instance ||
    a.env !== b.env ||
    a.repoURL !== b.repoURL ||
    a.path !== b.path ||
    a.targetRevision !== b.targetRevision
  ) {
    return false;
  }

  if (!sameEntries(a.valuesFiles, b.valuesFiles, (x, y) => x === y)) {
    return false;
  }

  if (!sameEntries(a.pluginEnv, b.pluginEnv, (x, y) => x.name === y.name && x.value === y.value)) {
    return false;
  }

  if (a.setters.size !== b.setters.size) {
    return false;
  }
  for (const [key, value] of a.setters) {
    if (b.setters.get(key) !== value) {
      return false;
    }
  }
  return true;
}
