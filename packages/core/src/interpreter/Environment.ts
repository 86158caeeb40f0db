import { Value } from "@quill/library";

/**
 * Single flat scope. Declaring or assigning a name replaces any earlier binding.
 */
export class Environment {
    private variables: Map<string, Value> = new Map();

    public define(name: string, value: Value): void {
        this.variables.set(name, value);
    }

    public get(name: string): Value | undefined {
        return this.variables.get(name);
    }

    public has(name: string): boolean {
        return this.variables.has(name);
    }

    // Assigning an undeclared name creates it
    public assign(name: string, value: Value): void {
        this.variables.set(name, value);
    }
}
