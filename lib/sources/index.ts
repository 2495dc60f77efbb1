import { EdgarSource } from './edgar';
import { SourceRegistry } from './registry';
import { ScreenerSource } from './screener';

export function createSourceRegistry() {
  return new SourceRegistry().register(new ScreenerSource()).register(new EdgarSource());
}
