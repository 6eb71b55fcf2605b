import {parseAllDocuments, visit, type Document} from 'yaml';

import {ApplicationParseError} from '../errors.js';
import type {Logger} from '../logger.js';
import {
  APPLICATION_API_VERSION,
  APPLICATION_KIND,
  type ApplicationDescriptor,
  type EnvVar,
  type RawApplication,
} from './types.js';

const INSTANCE_VAR = 'WERF_SET_INSTANCE';
const ENV_VAR = 'WERF_SET_ENV';
const SET_PREFIX = 'WERF_SET_';
const VALUES_PREFIX = 'WERF_VALUES_';

const INSTANCE_LABEL = 'instance';
const ENV_LABEL = 'env';
const REPOSITORY_ANNOTATION = 'rawRepository';
const PATH_ANNOTATION = 'rawPath';

type Mapping = Record<string, unknown>;

function isMapping(value: unknown): value is Mapping {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readMapping(value: unknown, field: string): Mapping {
  if (value === undefined || value === null) {
    return {};
  }
  if (!isMapping(value)) {
    throw new ApplicationParseError(`'${field}' must be a mapping`);
  }
  return value;
}

function readScalar(value: unknown, field: string): string {
  if (value === undefined || value === null) {
    return '';
  }
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') {
    return String(value);
  }
  throw new ApplicationParseError(`'${field}' must be a scalar`);
}

function readStringMap(value: unknown, field: string): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, item] of Object.entries(readMapping(value, field))) {
    result[key] = readScalar(item, `${field}.${key}`);
  }
  return result;
}

function readEnv(value: unknown, field: string): EnvVar[] {
  if (value === undefined || value === null) {
    return [];
  }
  if (!Array.isArray(value)) {
    throw new ApplicationParseError(`'${field}' must be a sequence`);
  }
  return value.map((item: unknown, i) => {
    const entry = readMapping(item, `${field}[${i}]`);
    return {
      name: readScalar(entry.name, `${field}[${i}].name`),
      value: readScalar(entry.value, `${field}[${i}].value`),
    };
  });
}

/**
 * Put the source text back into plain numeric and boolean scalars, so that
 * `targetRevision: 1.20` stays "1.20" rather than the number 1.2.
 */
function keepScalarSource(doc: Document): void {
  visit(doc, {
    Scalar(_, node) {
      const {value} = node;
      if ((typeof value === 'number' || typeof value === 'boolean' || typeof value === 'bigint') && node.source) {
        node.value = node.source;
      }
    },
  });
}

/**
 * Decode a parsed YAML document into the Application fields we care about.
 * Type mismatches fail the whole document.
 */
export function decodeRawApplication(doc: Mapping): RawApplication {
  const metadata = readMapping(doc.metadata, 'metadata');
  const spec = readMapping(doc.spec, 'spec');
  const source = readMapping(spec.source, 'spec.source');

  const raw: RawApplication = {
    apiVersion: readScalar(doc.apiVersion, 'apiVersion'),
    kind: readScalar(doc.kind, 'kind'),
    metadata: {
      name: readScalar(metadata.name, 'metadata.name'),
      labels: readStringMap(metadata.labels, 'metadata.labels'),
      annotations: readStringMap(metadata.annotations, 'metadata.annotations'),
    },
    spec: {
      source: {
        repoURL: readScalar(source.repoURL, 'spec.source.repoURL'),
        targetRevision: readScalar(source.targetRevision, 'spec.source.targetRevision'),
        path: readScalar(source.path, 'spec.source.path'),
      },
    },
  };

  if (source.plugin !== undefined && source.plugin !== null) {
    const plugin = readMapping(source.plugin, 'spec.source.plugin');
    raw.spec.source.plugin = {env: readEnv(plugin.env, 'spec.source.plugin.env')};
  }

  return raw;
}

/**
 * Split a `key=value` setter. Returns undefined when there is no `=`.
 */
export function splitSetter(input: string): {key: string; value: string} | undefined {
  const index = input.indexOf('=');
  if (index < 0) {
    return undefined;
  }
  return {key: input.slice(0, index), value: input.slice(index + 1)};
}

function resolveIdentity(
  field: 'instance' | 'env',
  fromLabel: string,
  fromPlugin: string
): string {
  if (fromLabel && fromPlugin && fromLabel !== fromPlugin) {
    throw new ApplicationParseError(
      `conflicting values for '${field}': label is '${fromLabel}', plugin.env is '${fromPlugin}'`
    );
  }
  return fromLabel || fromPlugin;
}

/**
 * Resolve one Application manifest into a validated descriptor.
 *
 * Labels win over WERF_SET_INSTANCE / WERF_SET_ENV only when they agree;
 * disagreement is an error. The `rawRepository` and `rawPath` annotations
 * take priority over `spec.source`, since the source may point at a plugin
 * proxy rather than the chart repository itself.
 */
export function resolveApplication(raw: RawApplication, logger: Logger): ApplicationDescriptor {
  const {metadata} = raw;
  const {source} = raw.spec;

  if (!metadata.name) {
    throw new ApplicationParseError('metadata.name is empty');
  }

  let instanceFromPlugin = '';
  let envFromPlugin = '';
  const pluginEnv: EnvVar[] = [];
  const indexedValues: {index: number; path: string}[] = [];
  const setters = new Map<string, string>();

  for (const envVar of source.plugin?.env ?? []) {
    if (envVar.name.startsWith(SET_PREFIX)) {
      const setter = splitSetter(envVar.value);
      if (setter) {
        setters.set(setter.key, setter.value);
      } else {
        logger.info(`ignoring '${envVar.name}': value '${envVar.value}' has no '='`);
      }
    }

    if (envVar.name === INSTANCE_VAR) {
      instanceFromPlugin = splitSetter(envVar.value)?.value ?? '';
    } else if (envVar.name === ENV_VAR) {
      envFromPlugin = splitSetter(envVar.value)?.value ?? '';
    } else if (envVar.name.startsWith(VALUES_PREFIX)) {
      const suffix = envVar.name.slice(VALUES_PREFIX.length);
      if (!/^\d+$/.test(suffix)) {
        logger.warn(`could not parse index from '${envVar.name}', skipping`);
        continue;
      }
      indexedValues.push({index: Number(suffix), path: envVar.value});
    } else {
      pluginEnv.push(envVar);
    }
  }

  // Array#sort is stable, so duplicate indices keep their input order.
  const valuesFiles = indexedValues.sort((a, b) => a.index - b.index).map(({path}) => path);

  const instance = resolveIdentity('instance', metadata.labels[INSTANCE_LABEL] ?? '', instanceFromPlugin);
  const env = resolveIdentity('env', metadata.labels[ENV_LABEL] ?? '', envFromPlugin);

  let repoURL = metadata.annotations[REPOSITORY_ANNOTATION] ?? '';
  if (!repoURL) {
    logger.warn(
      `missing '${REPOSITORY_ANNOTATION}' annotation, falling back to spec.source.repoURL='${source.repoURL}'`
    );
    repoURL = source.repoURL;
    if (!repoURL) {
      throw new ApplicationParseError(
        `both '${REPOSITORY_ANNOTATION}' annotation and 'spec.source.repoURL' are empty`
      );
    }
  }

  let path: string;
  if (Object.prototype.hasOwnProperty.call(metadata.annotations, PATH_ANNOTATION)) {
    path = metadata.annotations[PATH_ANNOTATION];
  } else {
    logger.warn(`missing '${PATH_ANNOTATION}' annotation, falling back to spec.source.path='${source.path}'`);
    path = source.path;
    if (!path) {
      logger.warn(`both '${PATH_ANNOTATION}' annotation and 'spec.source.path' are empty, using '.'`);
      path = '.';
    }
  }

  return {
    name: metadata.name,
    instance,
    env,
    repoURL,
    path,
    targetRevision: source.targetRevision,
    pluginEnv,
    valuesFiles,
    setters,
  };
}

/**
 * Parse a multi-document YAML stream and resolve every Argo CD Application
 * in it. Other resources are skipped. Any invalid document fails the call.
 */
export function parseApplications(data: Buffer | string, logger: Logger): ApplicationDescriptor[] {
  const text = typeof data === 'string' ? data : data.toString('utf-8');
  const applications: ApplicationDescriptor[] = [];

  for (const doc of parseAllDocuments(text)) {
    if (doc.errors.length > 0) {
      throw new ApplicationParseError(
        `failed to decode yaml document: ${doc.errors.map((e) => e.message).join('; ')}`
      );
    }

    keepScalarSource(doc);
    const content: unknown = doc.toJS();
    if (content === null || content === undefined) {
      continue;
    }
    if (!isMapping(content)) {
      throw new ApplicationParseError('failed to decode yaml document: expected a mapping at the document root');
    }

    if (content.apiVersion !== APPLICATION_API_VERSION || content.kind !== APPLICATION_KIND) {
      continue;
    }

    const name =
      isMapping(content.metadata) && typeof content.metadata.name === 'string' ? content.metadata.name : '';
    try {
      const raw = decodeRawApplication(content);
      applications.push(resolveApplication(raw, logger.child({application: raw.metadata.name})));
    } catch (error) {
      if (error instanceof ApplicationParseError && name) {
        throw new ApplicationParseError(error.message, name, {cause: error});
      }
      throw error;
    }
  }

  return applications;
}
