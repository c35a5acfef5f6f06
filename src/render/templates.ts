// Handlebars templates under templates/, compiled on first use and cached.
// Names ending in .txt are plain-text (email bodies) and skip HTML escaping.

import * as fs from "fs";
import Handlebars from "handlebars";
import * as path from "path";

type CompiledTemplate = (context: object) => string;

export class TemplateRenderer {
  private cache: Map<string, CompiledTemplate> = new Map();

  constructor(private readonly dir: string) {}

  render(name: string, context: object = {}): string {
    return this.compiled(name)(context);
  }

  private compiled(name: string): CompiledTemplate {
    const cached = this.cache.get(name);
    if (cached) return cached;

    const file = path.join(this.dir, `${name}.hbs`);
    const source = fs.readFileSync(file, "utf-8");
    const template = Handlebars.compile(source, {
      noEscape: name.endsWith(".txt"),
    });
    const compiled: CompiledTemplate = (context) => template(context);
    this.cache.set(name, compiled);
    return compiled;
  }
}
