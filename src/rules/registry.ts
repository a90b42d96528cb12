import type { FlexPackage } from '../locator/types.js';
import { FlexError, FlexErrorCode } from '../shared/errors.js';
import { logger } from '../shared/logger.js';
import { stepComment } from './command.js';
import { FLEX_TARGET_USAGE, parseTargetArguments, resolveCompileFlags, validateTargetOptions } from './options.js';
import type {
  BuildStep,
  DuplicatePolicy,
  FlexTargetOptions,
  GenerationRule,
  ParserRuleLookup,
  SourceFileProperties,
} from './types.js';

export interface RuleRegistryOptions {
  /** Located flex executable; null when flex is unavailable. */
  executable: string | null;
  version?: string;
  /** Working directory of every declared step. */
  sourceDir?: string;
  duplicatePolicy?: DuplicatePolicy;
}

/**
 * Caller-owned table of flex generation rules, keyed by rule name.
 * Registration only declares steps and records their shape; nothing is
 * written to disk until whoever consumes `commands()` runs them.
 */
export class RuleRegistry {
  private readonly executable: string | null;
  private readonly version: string;
  private readonly sourceDir: string;
  private readonly duplicatePolicy: DuplicatePolicy;
  private readonly table = new Map<string, GenerationRule>();
  private readonly properties = new Map<string, SourceFileProperties>();

  constructor(options: RuleRegistryOptions) {
    this.executable = options.executable;
    this.version = options.version ?? '';
    this.sourceDir = options.sourceDir ?? process.cwd();
    this.duplicatePolicy = options.duplicatePolicy ?? 'overwrite';
  }

  static fromPackage(pkg: FlexPackage, options: Omit<RuleRegistryOptions, 'executable' | 'version'> = {}): RuleRegistry {
    return new RuleRegistry({ ...options, executable: pkg.executable, version: pkg.version });
  }

  flexTarget(name: string, input: string, output: string, options: unknown = {}): GenerationRule {
    return this.register(name, input, output, validateTargetOptions(options));
  }

  /** Same as `flexTarget`, taking `COMPILE_FLAGS <string>` / `DEFINES_FILE <string>` keyword arguments. */
  flexTargetFromArgs(name: string, input: string, output: string, args: string[]): GenerationRule {
    return this.register(name, input, output, parseTargetArguments(args));
  }

  /**
   * Makes the object built from the scanner source depend on the parser's
   * generated header, so a regenerated header recompiles the scanner.
   */
  addFlexBisonDependency(flexName: string, bisonName: string, parserRules: ParserRuleLookup): void {
    const rule = this.table.get(flexName);
    if (!rule) {
      throw new FlexError(FlexErrorCode.MISSING_DEPENDENCY_TARGET, `Flex target \`${flexName}' does not exist.`, {
        flexTarget: flexName,
      });
    }
    const header = parserRules.get(bisonName)?.outputHeader;
    if (!header) {
      throw new FlexError(FlexErrorCode.MISSING_DEPENDENCY_TARGET, `Bison target \`${bisonName}' does not exist.`, {
        bisonTarget: bisonName,
      });
    }

    const current = this.properties.get(rule.output) ?? { objectDepends: [] };
    if (!current.objectDepends.includes(header)) {
      this.properties.set(rule.output, { objectDepends: [...current.objectDepends, header] });
    }
    logger.debug({ flexTarget: flexName, bisonTarget: bisonName, header }, 'Added scanner dependency on parser header');
  }

  isDefined(name: string): boolean {
    return this.table.has(name);
  }

  // Lookups hand out copies; the stored records only change through registration.
  get(name: string): GenerationRule | undefined {
    const rule = this.table.get(name);
    return rule ? copyRule(rule) : undefined;
  }

  rules(): GenerationRule[] {
    return [...this.table.values()].map(copyRule);
  }

  commands(): BuildStep[] {
    return this.rules().map((rule) => rule.step);
  }

  sourceProperties(file: string): SourceFileProperties | undefined {
    const properties = this.properties.get(file);
    return properties ? { objectDepends: [...properties.objectDepends] } : undefined;
  }

  private register(name: string, input: string, output: string, options: FlexTargetOptions): GenerationRule {
    if (!name || !input || !output) {
      throw new FlexError(FlexErrorCode.INVALID_RULE_ARGUMENTS, FLEX_TARGET_USAGE, { name, input, output });
    }
    if (!this.executable) {
      throw new FlexError(
        FlexErrorCode.TOOL_NOT_FOUND,
        `Cannot define flex target \`${name}': flex executable was not found`
      );
    }
    if (this.table.has(name)) {
      if (this.duplicatePolicy === 'error') {
        throw new FlexError(FlexErrorCode.DUPLICATE_RULE, `Flex target \`${name}' is already defined.`, { name });
      }
      logger.warn({ rule: name }, 'Flex target redefined; the previous definition is replaced');
    }

    const compileFlags = resolveCompileFlags(options);
    const outputHeader = options.definesFile ?? '';
    const outputs = outputHeader ? [output, outputHeader] : [output];

    const rule: GenerationRule = {
      name,
      defined: true,
      input,
      output,
      outputs,
      compileFlags,
      outputHeader,
      step: {
        rule: name,
        argv: [this.executable, ...compileFlags, `-o${output}`, input],
        outputs: [...outputs],
        depends: [input],
        workingDirectory: this.sourceDir,
        comment: stepComment(name, this.version),
      },
    };
    this.table.set(name, rule);
    return copyRule(rule);
  }
}

function copyStep(step: BuildStep): BuildStep {
  return { ...step, argv: [...step.argv], outputs: [...step.outputs], depends: [...step.depends] };
}

function copyRule(rule: GenerationRule): GenerationRule {
  return { ...rule, outputs: [...rule.outputs], compileFlags: [...rule.compileFlags], step: copyStep(rule.step) };
}
