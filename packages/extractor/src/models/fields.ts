import { EntityValidationError, type EntityKind } from '../errors.js';

export function requireName(entity: EntityKind, value: string | null | undefined): string {
  const name = value?.trim().toLowerCase() ?? '';
  if (!name) {
    throw new EntityValidationError(entity, 'name', `${entity} name cannot be empty`);
  }
  return name;
}

export function optionalText(value: string | null | undefined): string | null {
  const trimmed = value?.trim();
  return trimmed ? trimmed : null;
}

export function textList(values: readonly string[] | undefined): readonly string[] {
  return Object.freeze((values ?? []).map((v) => v.trim()).filter((v) => v.length > 0));
}
