// Base class for everything pipeline-kit can publish

import * as fs from 'fs/promises';
import * as path from 'path';
import { ABSTRACT_DEFINITION, DEFINITION_CONTRACT, DefinitionDescriptor } from '../models/definition.js';
import { TargetPathType } from '../models/types.js';
import { resolveTargetPath } from './target-path.js';

/**
 * A definition renders itself to a single file.
 *
 * Subclasses supply `targetFile`, `validate()` and `serialize()`. `targetPathType` and
 * `header` are getters so subclasses override them with getters too.
 */
export abstract class DefinitionBase implements DefinitionDescriptor {
  static readonly [DEFINITION_CONTRACT]: string = 'pipeline-kit.DefinitionBase';
  static readonly [ABSTRACT_DEFINITION]: boolean = true;

  /** Path of the generated file, interpreted according to `targetPathType` */
  abstract readonly targetFile: string;

  get targetPathType(): TargetPathType {
    return 'relativeToCurrentDir';
  }

  /**
   * Comment lines written above the rendered content. Return an empty array for none.
   */
  get header(): string[] {
    return [
      'DO NOT MODIFY THIS FILE!',
      '',
      `This file was generated by pipeline-kit from ${this.constructor.name}`,
      'To make changes, edit the definition, rebuild it and run `pipeline-kit publish`'
    ];
  }

  /**
   * Throws when the definition's configuration is invalid
   */
  abstract validate(): void;

  /**
   * Renders the definition body, without header
   */
  abstract serialize(): string;

  getTargetPath(): Promise<string> {
    return resolveTargetPath(this.targetFile, this.targetPathType);
  }

  /**
   * Full file content: header comments, a blank line, then the body
   */
  render(): string {
    const body = this.serialize();
    const content = body.endsWith('\n') ? body : `${body}\n`;
    const header = this.header;

    if (header.length === 0) {
      return content;
    }

    const comments = header.map(line => (line === '' ? '###' : `### ${line}`)).join('\n');
    return `${comments}\n\n${content}`;
  }

  /**
   * Overwrites the target file with the rendered content. The write is not atomic.
   */
  async publish(): Promise<void> {
    const target = await this.getTargetPath();
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, this.render(), 'utf-8');
  }
}
