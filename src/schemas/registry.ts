import type { ColumnSpec, FilingVersion, FormType, Schema } from '../types.js';
import { compareVersions, formatVersion } from './version.js';

interface VersionedSchemas {
  version: FilingVersion;
  forms: Map<FormType, Schema>;
}

/**
 * Column layouts keyed by (filing version, form type).
 *
 * Lookups fall back to the nearest prior registered version of a form type,
 * since filing formats only add or drop trailing columns between versions.
 * After `freeze()` the registry is read-only and can be shared by any number
 * of concurrent parsers.
 */
export class SchemaRegistry {
  // Sorted by ascending version.
  private readonly versions: VersionedSchemas[] = [];
  private frozen = false;

  register(version: FilingVersion, formType: FormType, columns: readonly ColumnSpec[]): Schema {
    if (this.frozen) {
      throw new Error(
        `Cannot register ${formType} for ${formatVersion(version)}: registry is frozen.`,
      );
    }
    const key = formType.toUpperCase();
    validateColumns(key, columns);

    let entry = this.versions.find((v) => compareVersions(v.version, version) === 0);
    if (!entry) {
      entry = { version, forms: new Map() };
      this.versions.push(entry);
      this.versions.sort((a, b) => compareVersions(a.version, b.version));
    }
    if (entry.forms.has(key)) {
      throw new Error(`Schema ${key} is already registered for ${formatVersion(version)}.`);
    }

    const schema: Schema = Object.freeze({
      version,
      formType: key,
      columns: Object.freeze(columns.map((c) => Object.freeze({ ...c }))),
    });
    entry.forms.set(key, schema);
    return schema;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  resolve(version: FilingVersion, formType: FormType): Schema | undefined {
    const key = formType.toUpperCase();
    for (let i = this.versions.length - 1; i >= 0; i--) {
      const entry = this.versions[i];
      if (compareVersions(entry.version, version) > 0) {
        continue;
      }
      const schema = entry.forms.get(key);
      if (schema) {
        return schema;
      }
    }
    return undefined;
  }

  /** Every form type that `resolve` can answer for `version`. */
  formTypes(version: FilingVersion): FormType[] {
    const found = new Set<FormType>();
    for (const entry of this.versions) {
      if (compareVersions(entry.version, version) > 0) {
        break;
      }
      for (const formType of entry.forms.keys()) {
        found.add(formType);
      }
    }
    return [...found].sort();
  }

  hasVersionAtOrBefore(version: FilingVersion): boolean {
    return this.versions.length > 0 && compareVersions(this.versions[0].version, version) <= 0;
  }

  registeredVersions(): FilingVersion[] {
    return this.versions.map((v) => v.version);
  }
}

function validateColumns(formType: FormType, columns: readonly ColumnSpec[]): void {
  if (columns.length === 0) {
    throw new Error(`Schema ${formType} must declare at least one column.`);
  }
  const names = new Set<string>();
  columns.forEach((column, i) => {
    if (column.position !== i) {
      throw new Error(
        `Schema ${formType}: column "${column.name}" has position ${column.position}, expected ${i}.`,
      );
    }
    if (names.has(column.name)) {
      throw new Error(`Schema ${formType}: duplicate column "${column.name}".`);
    }
    if (column.kind === 'enumerated' && (!column.values || column.values.length === 0)) {
      throw new Error(`Schema ${formType}: enumerated column "${column.name}" has no values.`);
    }
    names.add(column.name);
  });
}
