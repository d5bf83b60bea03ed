import type {
  PortalMenuItem,
  PortalTheme,
  StateClient,
  UpdatePortalCustomizationRequest,
} from '../client/types.js';
import type { ExecutionContext, SingletonOperations } from '../contracts.js';
import { ValidationError } from '../errors.js';
import { isRecord, mapOptionalBool, mapOptionalString } from './fields.js';
import { requestOptions, requireClient } from './support.js';

export class PortalCustomizationAdapter implements SingletonOperations<UpdatePortalCustomizationRequest> {
  readonly resourceType = 'portal_customization';

  constructor(private readonly client: StateClient | undefined) {}

  mapUpdateFields(_execContext: ExecutionContext, fields: Record<string, unknown>): UpdatePortalCustomizationRequest {
    const request: UpdatePortalCustomizationRequest = {};
    if (isRecord(fields.theme)) {
      request.theme = mapTheme(fields.theme);
    }
    const layout = mapOptionalString(fields, 'layout');
    if (layout !== undefined) {
      request.layout = layout;
    }
    const css = mapOptionalString(fields, 'css');
    if (css !== undefined) {
      request.css = css;
    }
    if (isRecord(fields.menu)) {
      const main = fields.menu.main;
      request.menu = {};
      if (main !== undefined) {
        request.menu.main = mapMenuItems(main, 'menu.main');
      }
      const footer = fields.menu.footer_sections;
      if (Array.isArray(footer)) {
        request.menu.footerSections = footer.map((section, index) => {
          if (!isRecord(section) || typeof section.title !== 'string') {
            throw new ValidationError(`menu.footer_sections[${index}] requires a title`);
          }
          return { title: section.title, items: mapMenuItems(section.items ?? [], `menu.footer_sections[${index}].items`) };
        });
      }
    }
    return request;
  }

  async update(
    portalId: string,
    request: UpdatePortalCustomizationRequest,
    execContext: ExecutionContext,
  ): Promise<void> {
    await requireClient(this.client, this.resourceType).updatePortalCustomization(
      portalId,
      request,
      requestOptions(execContext),
    );
  }
}

function mapTheme(theme: Record<string, unknown>): PortalTheme {
  const result: PortalTheme = {};
  const name = mapOptionalString(theme, 'name');
  if (name !== undefined) {
    result.name = name;
  }
  const mode = theme.mode;
  if (mode !== undefined) {
    if (mode !== 'light' && mode !== 'dark' && mode !== 'system') {
      throw new ValidationError(`invalid theme.mode '${String(mode)}'`);
    }
    result.mode = mode;
  }
  if (isRecord(theme.colors)) {
    const primary = mapOptionalString(theme.colors, 'primary');
    result.colors = primary !== undefined ? { primary } : {};
  }
  return result;
}

function mapMenuItems(value: unknown, path: string): PortalMenuItem[] {
  if (!Array.isArray(value)) {
    throw new ValidationError(`${path} must be a list`);
  }
  return value.map((item, index) => {
    if (!isRecord(item) || typeof item.path !== 'string' || typeof item.title !== 'string') {
      throw new ValidationError(`${path}[${index}] requires path and title`);
    }
    const entry: PortalMenuItem = { path: item.path, title: item.title };
    const visibility = mapOptionalString(item, 'visibility');
    if (visibility !== undefined) {
      entry.visibility = visibility;
    }
    const external = mapOptionalBool(item, 'external');
    if (external !== undefined) {
      entry.external = external;
    }
    return entry;
  });
}
