import { IConfigService, IDocumentHost } from '../context/contracts';
import { DocumentId } from '../context/types';

/**
 * Answers "is NES on for this document": the runtime switch, the configured
 * `enabled` setting, and the document being open and loaded.
 */
export class FeatureGate {
  private on = false;

  constructor(
    private readonly host: IDocumentHost,
    private readonly configService: IConfigService
  ) {}

  get isOn(): boolean {
    return this.on;
  }

  setOn(on: boolean): void {
    this.on = on;
  }

  isEnabled(documentId: DocumentId | undefined = this.host.getActiveDocumentId()): boolean {
    const enabled = this.on ? this.configService.config.enabled : false;
    if (documentId === undefined) {
      return false;
    }
    if (!(this.host.isValid(documentId) && this.host.isLoaded(documentId))) {
      return false;
    }
    if (typeof enabled === 'function') {
      return enabled(documentId);
    }
    return enabled;
  }
}
