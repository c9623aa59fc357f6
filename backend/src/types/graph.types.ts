/**
 * One per semantic chunk, keyed by the chunk id
 */
export interface DecisionNode {
    readonly kind: 'decision';
    readonly id: string;
    readonly topic: string;
    readonly decisionPoint: string;
    readonly context: string;
    readonly originalText: string;
    readonly nextSteps: readonly string[];
    readonly createdAt: Date;
}

/**
 * A choice surfaced by a decision node's analysis
 */
export interface OptionNode {
    readonly kind: 'option';
    readonly id: string;
    readonly parentId: string;
    readonly text: string;
}

/**
 * Decision -> option, labeled with the option text
 */
export interface OptionEdge {
    readonly kind: 'option';
    readonly id: string;
    readonly source: string;
    readonly target: string;
    readonly label: string;
}

/**
 * Previous decision -> next decision
 */
export interface FollowsEdge {
    readonly kind: 'follows';
    readonly id: string;
    readonly source: string;
    readonly target: string;
}

export type GraphEdge = OptionEdge | FollowsEdge;

/**
 * JSON-safe views used by the export snapshot
 */
export type DecisionNodeJSON = Omit<DecisionNode, 'createdAt' | 'nextSteps'> & {
    nextSteps: string[];
    createdAt: string;
};

export type GraphNodeJSON = DecisionNodeJSON | OptionNode;

export interface GraphJSON {
    nodes: GraphNodeJSON[];
    edges: GraphEdge[];
}

export interface GraphStats {
    decisionNodes: number;
    optionNodes: number;
    optionEdges: number;
    followsEdges: number;
    chainLength: number; // Decision nodes reachable along follows edges from the first one
}
