/**
 * @file defaults.ts
 * Defaults stack: immutable snapshots of node/beam/inertia/material defaults
 *
 * Elements keep a reference to the snapshot active when they were declared.
 * A `set_*` directive never mutates a published snapshot; it publishes a new one.
 */

//#region Built-in Values

export const BUILTIN = {
    SPRING: 9000000,
    DAMP: 12000,
    DEFORM: 400000,
    BREAK: 1000000,
    BEAM_DIAMETER: 0.05,
    BEAM_MATERIAL: 'tracks/beam',
    PLASTIC_DEFORM_COEF: 0,
    NODE_LOAD_WEIGHT: -1,
    NODE_FRICTION: 1,
    NODE_VOLUME: 1,
    NODE_SURFACE: 1,
    MINIMASS: 50,
    SKELETON_VISIBILITY_RANGE: 150,
    SKELETON_DIAMETER: 0.01,
} as const;

//#endregion

//#region Snapshots

export interface NodeDefaults {
    readonly loadWeight: number;
    readonly friction: number;
    readonly volume: number;
    readonly surface: number;
    /** NodeOption bits */
    readonly options: number;
}

export interface BeamDefaultsScale {
    readonly springiness: number;
    readonly dampingConstant: number;
    readonly deformationThresholdConstant: number;
    readonly breakingThresholdConstant: number;
}

export interface BeamDefaults {
    readonly springiness: number;
    readonly dampingConstant: number;
    readonly deformationThreshold: number;
    readonly breakingThreshold: number;
    readonly visualBeamDiameter: number;
    readonly beamMaterialName: string;
    readonly plasticDeformCoef: number;
    readonly enableAdvancedDeformation: boolean;
    readonly isUserDefined: boolean;
    readonly isPlasticDeformCoefUserDefined: boolean;
    readonly scale: BeamDefaultsScale;
}

export interface Inertia {
    readonly startDelayFactor: number;
    readonly stopDelayFactor: number;
    readonly startFunction: string;
    readonly stopFunction: string;
}

export interface ManagedMaterialsOptions {
    readonly doubleSided: boolean;
}

export interface DefaultMinimass {
    readonly minMassKg: number;
}

function publish<T extends object>(snapshot: T): Readonly<T> {
    return Object.freeze(snapshot);
}

export const BUILTIN_NODE_DEFAULTS: NodeDefaults = publish({
    loadWeight: BUILTIN.NODE_LOAD_WEIGHT,
    friction: BUILTIN.NODE_FRICTION,
    volume: BUILTIN.NODE_VOLUME,
    surface: BUILTIN.NODE_SURFACE,
    options: 0,
});

export const BUILTIN_BEAM_DEFAULTS: BeamDefaults = publish({
    springiness: BUILTIN.SPRING,
    dampingConstant: BUILTIN.DAMP,
    deformationThreshold: BUILTIN.DEFORM,
    breakingThreshold: BUILTIN.BREAK,
    visualBeamDiameter: BUILTIN.BEAM_DIAMETER,
    beamMaterialName: BUILTIN.BEAM_MATERIAL,
    plasticDeformCoef: BUILTIN.PLASTIC_DEFORM_COEF,
    enableAdvancedDeformation: false,
    isUserDefined: false,
    isPlasticDeformCoefUserDefined: false,
    scale: publish({
        springiness: 1,
        dampingConstant: 1,
        deformationThresholdConstant: 1,
        breakingThresholdConstant: 1,
    }),
});

export const BUILTIN_INERTIA: Inertia = publish({
    startDelayFactor: 0,
    stopDelayFactor: 0,
    startFunction: '',
    stopFunction: '',
});

export const BUILTIN_MANAGED_MATERIALS_OPTIONS: ManagedMaterialsOptions = publish({ doubleSided: false });

export const BUILTIN_DEFAULT_MINIMASS: DefaultMinimass = publish({ minMassKg: BUILTIN.MINIMASS });

//#endregion

//#region Directive Arguments

/** Arguments of `set_node_defaults`; negative or absent values mean built-in */
export interface NodeDefaultsArgs {
    loadWeight: number;
    friction?: number;
    volume?: number;
    surface?: number;
    options: number;
}

/** Arguments of `set_beam_defaults`; absent values keep the current snapshot */
export interface BeamDefaultsArgs {
    springiness: number;
    dampingConstant?: number;
    deformationThreshold?: number;
    breakingThreshold?: number;
    visualBeamDiameter?: number;
    beamMaterialName?: string;
    plasticDeformCoef?: number;
}

export interface InertiaDefaultsArgs {
    startDelayFactor: number;
    stopDelayFactor?: number;
    startFunction?: string;
    stopFunction?: string;
}

//#endregion

//#region Defaults Stack

/**
 * Holds the currently active snapshots and applies `set_*` directives.
 */
export class DefaultsStack {
    private nodeDefaults: NodeDefaults = BUILTIN_NODE_DEFAULTS;
    private beamDefaults: BeamDefaults = BUILTIN_BEAM_DEFAULTS;
    private inertiaDefaults: Inertia = BUILTIN_INERTIA;
    private managedMaterialsOptions: ManagedMaterialsOptions = BUILTIN_MANAGED_MATERIALS_OPTIONS;
    private defaultMinimass: DefaultMinimass = BUILTIN_DEFAULT_MINIMASS;
    private detacherGroup = 0;

    get node(): NodeDefaults { return this.nodeDefaults; }
    get beam(): BeamDefaults { return this.beamDefaults; }
    get inertia(): Inertia { return this.inertiaDefaults; }
    get managedMaterials(): ManagedMaterialsOptions { return this.managedMaterialsOptions; }
    get minimass(): DefaultMinimass { return this.defaultMinimass; }
    get currentDetacherGroup(): number { return this.detacherGroup; }

    setNodeDefaults(args: NodeDefaultsArgs): NodeDefaults {
        const pick = (value: number | undefined, builtin: number): number =>
            value === undefined || value < 0 ? builtin : value;

        this.nodeDefaults = publish({
            ...this.nodeDefaults,
            loadWeight: pick(args.loadWeight, BUILTIN.NODE_LOAD_WEIGHT),
            friction: pick(args.friction, BUILTIN.NODE_FRICTION),
            volume: pick(args.volume, BUILTIN.NODE_VOLUME),
            surface: pick(args.surface, BUILTIN.NODE_SURFACE),
            options: args.options,
        });
        return this.nodeDefaults;
    }

    setBeamDefaults(args: BeamDefaultsArgs, enableAdvancedDeformation: boolean): BeamDefaults {
        const current = this.beamDefaults;
        const pick = (value: number | undefined, previous: number, builtin: number): number => {
            if (value === undefined) {
                return previous;
            }
            return value < 0 ? builtin : value;
        };

        let plasticDeformCoef = current.plasticDeformCoef;
        let isPlasticDeformCoefUserDefined = current.isPlasticDeformCoefUserDefined;
        if (args.plasticDeformCoef !== undefined && args.plasticDeformCoef >= 0) {
            plasticDeformCoef = args.plasticDeformCoef;
            isPlasticDeformCoefUserDefined = true;
        }

        this.beamDefaults = publish({
            ...current,
            springiness: args.springiness < 0 ? BUILTIN.SPRING : args.springiness,
            dampingConstant: pick(args.dampingConstant, current.dampingConstant, BUILTIN.DAMP),
            deformationThreshold: pick(args.deformationThreshold, current.deformationThreshold, BUILTIN.DEFORM),
            breakingThreshold: pick(args.breakingThreshold, current.breakingThreshold, BUILTIN.BREAK),
            visualBeamDiameter: pick(args.visualBeamDiameter, current.visualBeamDiameter, BUILTIN.BEAM_DIAMETER),
            beamMaterialName: args.beamMaterialName ?? current.beamMaterialName,
            plasticDeformCoef,
            isPlasticDeformCoefUserDefined,
            enableAdvancedDeformation,
            isUserDefined: true,
        });
        return this.beamDefaults;
    }

    setBeamDefaultsScale(scale: BeamDefaultsScale): BeamDefaults {
        this.beamDefaults = publish({
            ...this.beamDefaults,
            scale: publish({ ...scale }),
        });
        return this.beamDefaults;
    }

    setInertiaDefaults(args: InertiaDefaultsArgs): Inertia {
        const stop = args.stopDelayFactor ?? 0;
        if (args.startDelayFactor < 0 || stop < 0) {
            this.inertiaDefaults = BUILTIN_INERTIA;
            return this.inertiaDefaults;
        }
        this.inertiaDefaults = publish({
            ...this.inertiaDefaults,
            startDelayFactor: args.startDelayFactor,
            stopDelayFactor: stop,
            startFunction: args.startFunction ?? this.inertiaDefaults.startFunction,
            stopFunction: args.stopFunction ?? this.inertiaDefaults.stopFunction,
        });
        return this.inertiaDefaults;
    }

    setManagedMaterialsOptions(doubleSided: boolean): ManagedMaterialsOptions {
        this.managedMaterialsOptions = publish({ doubleSided });
        return this.managedMaterialsOptions;
    }

    setDefaultMinimass(minMassKg: number): DefaultMinimass {
        this.defaultMinimass = publish({ minMassKg });
        return this.defaultMinimass;
    }

    setDetacherGroup(group: number): void {
        this.detacherGroup = group;
    }
}

//#endregion
