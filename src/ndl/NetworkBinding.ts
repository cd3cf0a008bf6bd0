import { NetworkBuilder } from "../builder/NetworkBuilder.js";
import type { Network } from "../network/types.js";
import { defaultLogger, type Logger } from "../options.js";
import { instrumentPass } from "../telemetry.js";
import type { Script } from "./Script.js";
import { PASSES, Pass, type NdlNode, type NodeEvaluator } from "./types.js";

/**
 * One network and the script that builds it, remembering the last statement
 * evaluated in each pass so that statements appended later are evaluated
 * without re-running the earlier ones.
 */
export class NetworkBinding {
  /** Evaluator that builds `network` from `script` */
  readonly builder: NetworkBuilder;
  private readonly lastNode: (NdlNode | undefined)[] = PASSES.map(() => undefined);

  constructor(
    readonly name: string,
    readonly network: Network,
    readonly script: Script,
    private readonly logger: Logger = defaultLogger,
  ) {
    this.builder = new NetworkBuilder(network, logger);
  }

  /**
   * Run every pass from Initial through `passUntil`, each resuming after the
   * last statement it has already evaluated.
   *
   * @param fullValidate - validate the whole network afterwards
   */
  process<H>(
    evaluator: NodeEvaluator<H>,
    passUntil: Pass = Pass.Final,
    fullValidate = false,
  ): void {
    for (const pass of PASSES) {
      if (pass > passUntil) break;
      const passName = Pass[pass];
      instrumentPass(passName, this.name, () => {
        const last = this.script.evaluate(evaluator, "", pass, this.lastNode[pass]);
        this.lastNode[pass] = last;
      });
      this.logger.debug("[ndl] %s pass done for model %s", passName, this.name);
    }
    if (fullValidate) this.network.validate();
  }

  /** Last statement evaluated in a pass */
  lastEvaluated(pass: Pass): NdlNode | undefined {
    return this.lastNode[pass];
  }

  /** Run the network builder through `passUntil` */
  build(passUntil: Pass = Pass.Final, fullValidate = false): void {
    this.process(this.builder, passUntil, fullValidate);
  }

  /** Drop the script's nodes and the network's contents */
  release(): void {
    this.script.release();
    this.network.clear();
    this.builder.handles.clear();
    this.lastNode.fill(undefined);
  }
}
