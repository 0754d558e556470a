import yaml from 'js-yaml';
import {
  APP_MODES,
  AppMode,
  CURRENT_DSL_VERSION,
  DEFAULT_IMPORTED_VERSION,
  DSL_MAX_SIZE,
  GRAPH_APP_MODES,
  isAppMode,
} from './constants.js';
import { YamlMapping, describeValue, isBlank, isMapping, isNonEmptyMapping } from './guards.js';
import { ValidationCollector } from './result.js';
import { detectVersionSkew, parseDslVersion } from './version.js';

/** A document that survived every fatal structural check. */
export interface StructuredDocument {
  readonly root: YamlMapping;
  readonly mode: AppMode;
  /** Present exactly when `mode` is graph based. */
  readonly workflow?: YamlMapping;
}

/**
 * Run the fail-fast structural checks. Returns `undefined` after recording
 * the first fatal error; later stages must not run in that case.
 */
export function validateStructure(content: string, collector: ValidationCollector): StructuredDocument | undefined {
  const size = content.length > DSL_MAX_SIZE ? codePointLength(content) : content.length;
  if (size > DSL_MAX_SIZE) {
    collector.error('size_check', 'FILE_TOO_LARGE', `File size exceeds the limit of ${DSL_MAX_SIZE / 1024 / 1024}MB`, {
      size,
      limit: DSL_MAX_SIZE,
    });
    return undefined;
  }

  if (content.trim() === '') {
    collector.error('content_check', 'EMPTY_CONTENT', 'Empty YAML content');
    return undefined;
  }

  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    const reason = error instanceof yaml.YAMLException ? error.message : String(error);
    collector.error('yaml_parsing', 'YAML_SYNTAX_ERROR', `Invalid YAML format: ${reason}`);
    return undefined;
  }

  if (!isMapping(parsed)) {
    collector.error('yaml_parsing', 'INVALID_YAML_TYPE', 'Invalid YAML format: content must be a mapping', {
      actual_type: describeValue(parsed),
    });
    return undefined;
  }

  if (!checkVersion(parsed, collector)) return undefined;
  checkKind(parsed, collector);

  const app = parsed.app;
  if (!isNonEmptyMapping(app)) {
    collector.error('schema_validation', 'MISSING_APP_DATA', 'Missing app data in YAML content');
    return undefined;
  }

  const mode = app.mode;
  if (isBlank(mode)) {
    collector.error('schema_validation', 'MISSING_APP_MODE', 'Missing app mode');
    return undefined;
  }
  if (!isAppMode(mode)) {
    collector.error(
      'schema_validation',
      'INVALID_APP_MODE',
      `Invalid app mode: ${String(mode)}. Must be one of: ${APP_MODES.join(', ')}`,
      { app_mode: mode, valid_modes: [...APP_MODES] },
    );
    return undefined;
  }
  collector.info.app_mode = mode;

  if (GRAPH_APP_MODES.has(mode)) {
    const workflow = parsed.workflow;
    if (!isNonEmptyMapping(workflow)) {
      collector.error(
        'schema_validation',
        'MISSING_WORKFLOW_DATA',
        'Missing workflow data for workflow/advanced chat app',
      );
      return undefined;
    }
    return { root: parsed, mode, workflow };
  }

  if (!('model_config' in parsed)) {
    collector.error('schema_validation', 'MISSING_MODEL_CONFIG', `Missing model_config for ${mode} app`);
    return undefined;
  }
  return { root: parsed, mode };
}

function checkVersion(document: YamlMapping, collector: ValidationCollector): boolean {
  if (isBlank(document.version)) {
    document.version = DEFAULT_IMPORTED_VERSION;
  }

  const imported = document.version;
  if (typeof imported !== 'string') {
    collector.error(
      'version_check',
      'INVALID_VERSION_TYPE',
      `Invalid version type, expected string, got ${describeValue(imported)}`,
    );
    return false;
  }
  collector.info.dsl_version = imported;

  const parsed = parseDslVersion(imported);
  if (!parsed) {
    collector.error('version_check', 'INVALID_VERSION_FORMAT', `Invalid version format: ${imported}`);
    return false;
  }

  const details = { imported_version: imported, current_version: CURRENT_DSL_VERSION };
  switch (detectVersionSkew(parsed)) {
    case 'newer':
      collector.warning(
        'version_check',
        'VERSION_NEWER',
        `DSL version ${imported} is newer than current ${CURRENT_DSL_VERSION}. User confirmation may be required.`,
        details,
      );
      break;
    case 'major-older':
      collector.warning(
        'version_check',
        'VERSION_MAJOR_MISMATCH',
        `DSL version ${imported} has different major version. User confirmation may be required.`,
        details,
      );
      break;
    case 'minor-older':
      collector.warning(
        'version_check',
        'VERSION_MINOR_OLDER',
        `DSL version ${imported} is older than current ${CURRENT_DSL_VERSION}`,
        details,
      );
      break;
    case 'compatible':
      break;
  }
  return true;
}

function checkKind(document: YamlMapping, collector: ValidationCollector): void {
  const kind = document.kind;
  if (kind !== undefined && kind !== null && kind !== 'app') {
    collector.warning('schema_validation', 'INVALID_KIND', `Unexpected kind ${JSON.stringify(kind)}; treating document as "app"`, {
      kind,
    });
  }
  document.kind = 'app';
}

/** Surrogate pairs count once. */
export function codePointLength(text: string): number {
  let count = 0;
  for (let i = 0; i < text.length; i++) {
    const unit = text.charCodeAt(i);
    if (unit >= 0xd800 && unit <= 0xdbff && i + 1 < text.length) {
      const next = text.charCodeAt(i + 1);
      if (next >= 0xdc00 && next <= 0xdfff) i++;
    }
    count++;
  }
  return count;
}
