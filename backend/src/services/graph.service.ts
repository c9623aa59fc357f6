import type {
    SemanticChunk,
    StructuredAnalysis,
    DecisionNode,
    OptionNode,
    GraphEdge,
    OptionEdge,
    FollowsEdge,
    GraphJSON,
    GraphNodeJSON,
    GraphStats
} from '../types';

/**
 * Append-only decision graph for one conversation.
 *
 * Each chunk becomes a decision node with its option nodes hanging off it.
 * Consecutive decision nodes are chained with "follows" edges; the chain is
 * driven by an explicit pointer to the last decision node added, never by
 * the order nodes happen to be stored in.
 */
export class GraphService {
    private decisions: Map<string, DecisionNode> = new Map();
    private options: Map<string, OptionNode> = new Map();
    private edges: GraphEdge[] = [];
    private incoming: Map<string, GraphEdge[]> = new Map();
    private lastDecisionNodeId: string | null = null;

    constructor(private now: () => Date = () => new Date()) {}

    /**
     * Add a chunk's decision node, its options, and the follows edge from the
     * previous decision node. Adding the same chunk id twice is a no-op.
     */
    addChunk(chunk: SemanticChunk, analysis: StructuredAnalysis): string {
        if (this.decisions.has(chunk.id)) {
            console.warn(`⚠️ Decision node ${chunk.id} already exists, skipping`);
            return chunk.id;
        }

        const decision: DecisionNode = {
            kind: 'decision',
            id: chunk.id,
            topic: analysis.topic,
            decisionPoint: analysis.decision_point,
            context: analysis.context,
            originalText: chunk.text,
            nextSteps: [...analysis.next_steps],
            createdAt: this.now()
        };

        const optionNodes: OptionNode[] = analysis.options.map((text, index): OptionNode => ({
            kind: 'option',
            id: `${chunk.id}_option_${index}`,
            parentId: chunk.id,
            text
        }));

        const newEdges: GraphEdge[] = optionNodes.map((option): OptionEdge => ({
            kind: 'option',
            id: this.edgeId(chunk.id, option.id),
            source: chunk.id,
            target: option.id,
            label: option.text
        }));

        if (this.lastDecisionNodeId !== null) {
            const follows: FollowsEdge = {
                kind: 'follows',
                id: this.edgeId(this.lastDecisionNodeId, chunk.id),
                source: this.lastDecisionNodeId,
                target: chunk.id
            };
            newEdges.push(follows);
        }

        // Commit everything together
        this.decisions.set(decision.id, decision);
        for (const option of optionNodes) {
            this.options.set(option.id, option);
        }
        for (const edge of newEdges) {
            this.edges.push(edge);
            const list = this.incoming.get(edge.target) ?? [];
            list.push(edge);
            this.incoming.set(edge.target, list);
        }
        this.lastDecisionNodeId = decision.id;

        console.log(`🌳 Added decision node ${decision.id}: ${decision.topic} (${optionNodes.length} options)`);
        return decision.id;
    }

    getDecisionNode(id: string): DecisionNode | undefined {
        return this.decisions.get(id);
    }

    getDecisionNodes(): DecisionNode[] {
        return [...this.decisions.values()];
    }

    /**
     * Options of a decision node, in the order the analysis listed them
     */
    getOptions(decisionId: string): OptionNode[] {
        const result: OptionNode[] = [];
        for (const edge of this.edges) {
            if (edge.kind !== 'option' || edge.source !== decisionId) continue;
            const option = this.options.get(edge.target);
            if (option) result.push(option);
        }
        return result;
    }

    getEdges(): GraphEdge[] {
        return [...this.edges];
    }

    getIncomingEdges(nodeId: string): GraphEdge[] {
        return [...(this.incoming.get(nodeId) ?? [])];
    }

    getLastDecisionNodeId(): string | null {
        return this.lastDecisionNodeId;
    }

    getStats(): GraphStats {
        let optionEdges = 0;
        let followsEdges = 0;
        const next = new Map<string, string>();
        let first: string | null = null;

        for (const edge of this.edges) {
            if (edge.kind === 'option') {
                optionEdges++;
            } else {
                followsEdges++;
                next.set(edge.source, edge.target);
            }
        }
        for (const id of this.decisions.keys()) {
            if (!this.incoming.get(id)?.some(edge => edge.kind === 'follows')) {
                first = id;
                break;
            }
        }

        let chainLength = 0;
        const visited = new Set<string>();
        for (let id = first; id !== null && !visited.has(id); id = next.get(id) ?? null) {
            visited.add(id);
            chainLength++;
        }

        return {
            decisionNodes: this.decisions.size,
            optionNodes: this.options.size,
            optionEdges,
            followsEdges,
            chainLength
        };
    }

    /**
     * Serializable node and edge lists; decision nodes come before the
     * option nodes that hang off them
     */
    toJSON(): GraphJSON {
        const nodes: GraphNodeJSON[] = [];
        for (const decision of this.decisions.values()) {
            nodes.push({
                ...decision,
                nextSteps: [...decision.nextSteps],
                createdAt: decision.createdAt.toISOString()
            });
            nodes.push(...this.getOptions(decision.id).map(option => ({ ...option })));
        }
        return {
            nodes,
            edges: this.edges.map(edge => ({ ...edge }))
        };
    }

    private edgeId(source: string, target: string): string {
        return `e-${source}-${target}`;
    }
}
