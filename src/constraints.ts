import { getAddressEncoder, type Address } from "@solana/kit";
import { ErrorCode, ProgramError } from "./errors.js";
import { verifyCanonicalAddress, type Seed } from "./pda.js";
import type { AccountView, TypedAccount } from "./capabilities.js";

/**
 * A seed for a `seeds` constraint: a literal, or the address of another slot.
 */
export type SeedSource<TField extends string = string> = Seed | { account: TField };

/** The field's view must carry a signer proof. */
export interface SignerConstraint<TField extends string = string> {
    kind: "signer";
    field: TField;
}

/** The field's view must be owned (or typed) with the given owner. */
export interface OwnerConstraint<TField extends string = string> {
    kind: "owner";
    field: TField;
    program: Address;
}

/**
 * The stored address at `field.path` must equal the address of `target`.
 *
 * Proves nothing about whether `target` signed: pair it with a signer slot
 * or a {@link SignerConstraint} on `target`.
 */
export interface HasOneConstraint<TField extends string = string> {
    kind: "hasOne";
    field: TField;
    path: string;
    target: TField;
}

/**
 * The field's address must be the canonical derivation of `seeds`. With
 * `bump`, the stored bump at that path must also be the canonical one.
 */
export interface SeedsConstraint<TField extends string = string> {
    kind: "seeds";
    field: TField;
    seeds: readonly SeedSource<TField>[];
    /** @default the instruction's program */
    program?: Address;
    bump?: string;
}

/** The stored flag at `field.flag` must be unset before the handler runs. */
export interface InitGuardConstraint<TField extends string = string> {
    kind: "initGuard";
    field: TField;
    flag: string;
}

export type Constraint<TField extends string = string> =
    | SignerConstraint<TField>
    | OwnerConstraint<TField>
    | HasOneConstraint<TField>
    | SeedsConstraint<TField>
    | InitGuardConstraint<TField>;

export const requireSigner = <TField extends string>(field: TField): SignerConstraint<TField> => ({
    kind: "signer",
    field,
});

export const requireOwned = <TField extends string>(
    field: TField,
    program: Address,
): OwnerConstraint<TField> => ({ kind: "owner", field, program });

/**
 * `has_one`-style relation. `target` defaults to the field named by `path`.
 *
 * @example
 * ```typescript
 * hasOne("vault", "authority"); // vault.authority == authority.address
 * hasOne("config", "admin", "authority"); // config.admin == authority.address
 * ```
 */
export function hasOne<TField extends string>(field: TField, path: TField): HasOneConstraint<TField>;
export function hasOne<TField extends string>(
    field: TField,
    path: string,
    target: TField,
): HasOneConstraint<TField>;
export function hasOne(field: string, path: string, target: string = path): HasOneConstraint {
    return { kind: "hasOne", field, path, target };
}

export const seeds = <TField extends string>(
    field: TField,
    sources: readonly SeedSource<TField>[],
    options: { program?: Address; bump?: string } = {},
): SeedsConstraint<TField> => ({ kind: "seeds", field, seeds: sources, ...options });

export const initGuard = <TField extends string>(
    field: TField,
    flag: string,
): InitGuardConstraint<TField> => ({ kind: "initGuard", field, flag });

/**
 * Value at a dotted path of decoded account data, `undefined` when absent.
 */
export function readPath(data: object, path: string): unknown {
    let current: unknown = data;
    for (const segment of path.split(".")) {
        if (typeof current !== "object" || current === null) return undefined;
        current = Object.getOwnPropertyDescriptor(current, segment)?.value;
    }
    return current;
}

function viewFor(views: ReadonlyMap<string, AccountView>, field: string): AccountView {
    const view = views.get(field);
    if (!view) {
        throw new Error(`Constraint references unknown account "${field}"`);
    }
    return view;
}

function typedViewFor(
    views: ReadonlyMap<string, AccountView>,
    field: string,
    constraint: Constraint["kind"],
): TypedAccount {
    const view = viewFor(views, field);
    if (view.kind !== "typed") {
        throw new Error(`${constraint} constraint on "${field}" needs a typed account, got ${view.kind}`);
    }
    return view;
}

function carriesSignerProof(view: AccountView): boolean {
    switch (view.kind) {
        case "signer":
            return true;
        case "owned":
        case "typed":
            return view.isSigner;
        case "unchecked":
            // no proof, whatever the account claims
            return false;
        default:
            view satisfies never;
            return false;
    }
}

function resolveSeeds(
    sources: readonly SeedSource[],
    views: ReadonlyMap<string, AccountView>,
): Seed[] {
    return sources.map((source) =>
        typeof source === "object" && "account" in source
            ? getAddressEncoder().encode(viewFor(views, source.account).address)
            : source,
    );
}

function checkSigner(constraint: SignerConstraint, views: ReadonlyMap<string, AccountView>): void {
    const view = viewFor(views, constraint.field);
    if (!carriesSignerProof(view)) {
        throw new ProgramError(
            ErrorCode.NotSigner,
            `${constraint.field}: account ${view.address} is not a signer`,
            { field: constraint.field, address: view.address },
        );
    }
}

function checkOwner(constraint: OwnerConstraint, views: ReadonlyMap<string, AccountView>): void {
    const view = viewFor(views, constraint.field);
    if ((view.kind !== "owned" && view.kind !== "typed") || view.owner !== constraint.program) {
        throw new ProgramError(
            ErrorCode.WrongOwner,
            `${constraint.field}: account ${view.address} is not proven to be owned by ${constraint.program}`,
            { field: constraint.field, address: view.address, expectedOwner: constraint.program },
        );
    }
}

function checkHasOne(constraint: HasOneConstraint, views: ReadonlyMap<string, AccountView>): void {
    const view = typedViewFor(views, constraint.field, "hasOne");
    const target = viewFor(views, constraint.target);
    const stored = readPath(view.data, constraint.path);

    if (stored !== target.address) {
        throw new ProgramError(
            ErrorCode.HasOneMismatch,
            `${constraint.field}.${constraint.path} is ${String(stored)}, expected ${constraint.target} ${target.address}`,
            { field: constraint.field, path: constraint.path, target: constraint.target },
        );
    }
}

function checkSeeds(
    constraint: SeedsConstraint,
    views: ReadonlyMap<string, AccountView>,
    programAddress: Address,
): void {
    const view = viewFor(views, constraint.field);
    const canonicalBump = verifyCanonicalAddress(
        view.address,
        resolveSeeds(constraint.seeds, views),
        constraint.program ?? programAddress,
    );

    if (constraint.bump === undefined) return;

    const typed = typedViewFor(views, constraint.field, "seeds");
    const storedBump = readPath(typed.data, constraint.bump);
    if (storedBump !== canonicalBump) {
        throw new ProgramError(
            ErrorCode.PdaMismatch,
            `${constraint.field}.${constraint.bump} stores bump ${String(storedBump)}, canonical bump is ${canonicalBump}`,
            { field: constraint.field, storedBump, canonicalBump },
        );
    }
}

function checkInitGuard(
    constraint: InitGuardConstraint,
    views: ReadonlyMap<string, AccountView>,
): void {
    const view = typedViewFor(views, constraint.field, "initGuard");
    const flag = readPath(view.data, constraint.flag);

    if (flag !== undefined && flag !== false && flag !== 0 && flag !== 0n) {
        throw new ProgramError(
            ErrorCode.AlreadyInitialized,
            `${constraint.field}: account ${view.address} is already initialized`,
            { field: constraint.field, flag: constraint.flag },
        );
    }
}

/**
 * Evaluate constraints in order against resolved views, stopping at the
 * first failure.
 *
 * @throws {ProgramError} the failing constraint's code
 */
export function evaluateConstraints(
    constraints: readonly Constraint[],
    views: ReadonlyMap<string, AccountView>,
    programAddress: Address,
): void {
    for (const constraint of constraints) {
        switch (constraint.kind) {
            case "signer":
                checkSigner(constraint, views);
                break;
            case "owner":
                checkOwner(constraint, views);
                break;
            case "hasOne":
                checkHasOne(constraint, views);
                break;
            case "seeds":
                checkSeeds(constraint, views, programAddress);
                break;
            case "initGuard":
                checkInitGuard(constraint, views);
                break;
            default:
                constraint satisfies never;
        }
    }
}
