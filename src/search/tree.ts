/**
 * MCTS tree node.
 *
 * Parents own their children. The parent link is used only to walk
 * statistics back up during backpropagation.
 *
 * UCB1 = wins / visits + C * sqrt(ln(parentVisits) / visits)
 * An unvisited child scores +Infinity.
 */
import { RulesEngine } from '../core/rules';
import { GameState, Move, Player } from '../core/types';
import { SeededRandom } from '../utils/random';

export class SearchNode {
  readonly state: GameState;
  readonly parent: SearchNode | null;
  /** Move that produced this node; null at the root. */
  readonly move: Move | null;
  /** Player who made `move`. At the root, the player who moved last. */
  readonly actor: Player;
  readonly children: SearchNode[] = [];
  readonly untriedMoves: Move[];

  visits = 0;
  /** Wins from the actor's point of view; draws count half. */
  wins = 0;

  /** Leading untried moves to expand in order before random picks. */
  private priorityCount: number;

  constructor(
    state: GameState,
    parent: SearchNode | null,
    move: Move | null,
    actor: Player,
    untriedMoves: Move[],
    priorityCount = 0,
  ) {
    this.state = state;
    this.parent = parent;
    this.move = move;
    this.actor = actor;
    this.untriedMoves = untriedMoves;
    this.priorityCount = Math.min(priorityCount, untriedMoves.length);
  }

  get isTerminal(): boolean {
    return this.state.winner !== null;
  }

  get isFullyExpanded(): boolean {
    return this.untriedMoves.length === 0;
  }

  get winRate(): number {
    return this.visits > 0 ? this.wins / this.visits : 0;
  }

  ucb1(explorationWeight: number): number {
    if (this.visits === 0 || !this.parent) return Infinity;
    const exploitation = this.wins / this.visits;
    const exploration = explorationWeight * Math.sqrt(Math.log(this.parent.visits) / this.visits);
    return exploitation + exploration;
  }

  /** Child with the highest UCB1; the earliest wins ties. */
  selectChild(explorationWeight: number): SearchNode {
    let best = this.children[0];
    let bestValue = -Infinity;
    for (const child of this.children) {
      const value = child.ucb1(explorationWeight);
      if (value > bestValue) {
        bestValue = value;
        best = child;
      }
    }
    return best;
  }

  /**
   * Take one untried move (priority moves first, otherwise a random one),
   * apply it to a clone and attach the resulting child.
   */
  expand(engine: RulesEngine, rng: SeededRandom): SearchNode {
    if (this.untriedMoves.length === 0) {
      throw new Error('No untried moves to expand');
    }

    let index = 0;
    if (this.priorityCount > 0) {
      this.priorityCount--;
    } else {
      index = rng.randomInt(this.untriedMoves.length);
    }
    const [move] = this.untriedMoves.splice(index, 1);

    const childState = engine.clone(this.state);
    engine.applyMove(childState, move);

    const child = new SearchNode(childState, this, move, move.player, engine.legalMoves(childState));
    this.children.push(child);
    return child;
  }

  backpropagate(winner: Player | null): void {
    for (let node: SearchNode | null = this; node !== null; node = node.parent) {
      node.visits++;
      if (winner === null) {
        node.wins += 0.5;
      } else if (winner === node.actor) {
        node.wins += 1;
      }
    }
  }
}
