/**
 * FSI Model Registry
 * Resolves a model selector (kind or short label) to one of the registered FSI models
 */

import type { FsiModel, FsiModelKind } from "../fsi/types.js";
import { InvalidConfigurationError } from "./errors.js";

export interface FsiModelDefinition {
  kind: FsiModelKind;
  label: string;
  create: (params: Record<string, unknown>) => FsiModel;
}

export class FsiModelRegistry {
  private definitions = new Map<FsiModelKind, FsiModelDefinition>();
  private labels = new Map<string, FsiModelKind>();

  /**
   * Register an FSI model definition
   */
  register(definition: FsiModelDefinition): void {
    this.definitions.set(definition.kind, definition);
    this.labels.set(definition.label, definition.kind);
  }

  /**
   * Get available model kinds
   */
  getAvailable(): FsiModelKind[] {
    return Array.from(this.definitions.keys());
  }

  resolve(selector: string): FsiModelDefinition {
    const kind = this.labels.get(selector) ?? selector;
    for (const definition of this.definitions.values()) {
      if (definition.kind === kind) {
        return definition;
      }
    }
    throw new InvalidConfigurationError(`FSI model ${selector} not found`, {
      selector,
      available: this.getAvailable(),
    });
  }

  /**
   * Build a model from raw parameters; the model validates its own parameter domain
   */
  create(selector: string, params: Record<string, unknown>): FsiModel {
    const definition = this.resolve(selector);
    return definition.create({ ...params, model: definition.kind });
  }
}

// Global registry instance
export const fsiModelRegistry = new FsiModelRegistry();

import { RescatteringMatrixModel, TriangleRescatteringModel } from "../fsi/index.js";

fsiModelRegistry.register({
  kind: "rescattering-matrix",
  label: "A",
  create: (params) => RescatteringMatrixModel.fromParameters(params),
});
fsiModelRegistry.register({
  kind: "triangle-rescattering",
  label: "B",
  create: (params) => TriangleRescatteringModel.fromParameters(params),
});
