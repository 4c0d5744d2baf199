export * from './models/label-config.ts';
export * from './models/label-element.ts';
export * from './models/font-settings.ts';
export * from './models/custom-label-design.ts';
export * from './models/shipping-label.ts';

export * from './fonts/font-roles.ts';
export * from './fonts/font-resolver.ts';

export * from './layout/units.ts';
export * from './layout/default-layout.ts';

export * from './printing/tspl-commands.ts';
export * from './printing/address-lines.ts';
export * from './printing/shipping-label-renderer.ts';
export * from './printing/design-renderer.ts';
export * from './printing/test-print.ts';

export * from './services/key-value-store.ts';
export * from './services/font-settings-service.ts';
export * from './services/label-config-service.ts';
export * from './services/label-design-service.ts';

export * from './config/render-config.ts';
