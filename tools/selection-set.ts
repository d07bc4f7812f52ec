import {
    FieldNode,
    GraphQLField,
    GraphQLInterfaceType,
    GraphQLObjectType,
    GraphQLOutputType,
    GraphQLUnionType,
    Kind,
    SelectionSetNode,
    getNamedType,
    isInterfaceType,
    isLeafType,
    isObjectType,
    isRequiredArgument,
    print,
} from 'graphql';

// Local resolution is cheap; every remote level adds to request and response size.
export const LOCAL_SELECTION_DEPTH = 5;
export const REMOTE_SELECTION_DEPTH = 2;

type CompositeType = GraphQLObjectType | GraphQLInterfaceType | GraphQLUnionType;

function fieldNode(name: string, selectionSet?: SelectionSetNode): FieldNode {
    return {
        kind: Kind.FIELD,
        name: { kind: Kind.NAME, value: name },
        ...(selectionSet ? { selectionSet } : {}),
    };
}

function selectionSetNode(selections: FieldNode[]): SelectionSetNode {
    return { kind: Kind.SELECTION_SET, selections };
}

function isSelectable(field: GraphQLField<unknown, unknown>): boolean {
    return !field.args.some(isRequiredArgument);
}

function collectSelections(type: CompositeType, depth: number, visited: ReadonlySet<string>): FieldNode[] {
    if (!isObjectType(type) && !isInterfaceType(type)) {
        return [];
    }

    const selections: FieldNode[] = [];
    for (const field of Object.values(type.getFields())) {
        if (!isSelectable(field)) {
            continue;
        }

        const namedType = getNamedType(field.type);
        if (isLeafType(namedType)) {
            selections.push(fieldNode(field.name));
            continue;
        }

        if (depth - 1 <= 0 || visited.has(namedType.name)) {
            continue;
        }

        const children = collectSelections(namedType, depth - 1, new Set([...visited, namedType.name]));
        if (children.length > 0) {
            selections.push(fieldNode(field.name, selectionSetNode(children)));
        }
    }
    return selections;
}

/**
 * Selection of leaf fields for `type`, descending at most `maxDepth` object levels
 * and never into a type already on the current branch. Leaf types need no selection.
 */
export function buildSelection(
    type: GraphQLOutputType,
    maxDepth: number,
    visited: ReadonlySet<string> = new Set(),
): SelectionSetNode | undefined {
    const namedType = getNamedType(type);
    if (isLeafType(namedType)) {
        return undefined;
    }

    const selections = maxDepth > 0
        ? collectSelections(namedType, maxDepth, new Set([...visited, namedType.name]))
        : [];
    if (selections.length === 0) {
        return selectionSetNode([fieldNode('__typename')]);
    }
    return selectionSetNode(selections);
}

export function printSelection(selection: SelectionSetNode | undefined): string {
    return selection ? print(selection) : '';
}
