/**
 * @file rigdef.ts
 * In-memory model of a parsed rig definition
 *
 * A document holds a root module and any number of named user modules
 * (`section` ... `end_section`). Every module holds one ordered collection
 * per element kind; elements are plain records.
 */

import { BeamDefaults, DefaultMinimass, Inertia, ManagedMaterialsOptions, NodeDefaults } from './defaults';
import { NodeId, NodeRange, NodeRef } from './noderef';

//#region Common

export interface Vec3 {
    x: number;
    y: number;
    z: number;
}

export function vec3(x: number = 0, y: number = 0, z: number = 0): Vec3 {
    return { x, y, z };
}

/** Mutable per-element inertia, seeded from nothing and filled from optional args */
export interface OptionalInertia {
    startDelayFactor: number;
    stopDelayFactor: number;
    startFunction: string;
    stopFunction: string;
}

export function emptyInertia(): OptionalInertia {
    return { startDelayFactor: 0, stopDelayFactor: 0, startFunction: '', stopFunction: '' };
}

/** Synthetic node ids reserved for an element by the sequential importer */
export interface GeneratedNodeRange {
    first: number;
    count: number;
}

export type CameraSettings =
    | { mode: 'always' }
    | { mode: 'external' }
    | { mode: 'cinecam'; cinecamIndex: number };

//#endregion

//#region Option Bits

export enum NodeOption {
    LoadWeight = 1 << 0,        // l
    MouseGrab = 1 << 1,         // n
    NoMouseGrab = 1 << 2,       // m
    NoSparks = 1 << 3,          // f
    ExhaustPoint = 1 << 4,      // x
    ExhaustDirection = 1 << 5,  // y
    NoGroundContact = 1 << 6,   // c
    HookPoint = 1 << 7,         // h
    TerrainEditPoint = 1 << 8,  // e
    ExtraBuoyancy = 1 << 9,     // b
    NoParticles = 1 << 10,      // p
    Log = 1 << 11,              // L
}

export enum BeamOption {
    Invisible = 1 << 0,
    Rope = 1 << 1,
    Support = 1 << 2,
}

export enum ShockOption {
    Invisible = 1 << 0,
    Metric = 1 << 1,
    ActiveRight = 1 << 2,
    ActiveLeft = 1 << 3,
}

export enum Shock2Option {
    Invisible = 1 << 0,
    Metric = 1 << 1,
    AbsoluteMetric = 1 << 2,
    SoftBumpBounds = 1 << 3,
}

export enum Shock3Option {
    Invisible = 1 << 0,
    Metric = 1 << 1,
    AbsoluteMetric = 1 << 2,
}

export enum CabOption {
    Contact = 1 << 0,
    Buoyant = 1 << 1,
    Tougher10x = 1 << 2,
    Invulnerable = 1 << 3,
}

export enum TriggerOption {
    Invisible = 1 << 0,            // i
    CommandStyle = 1 << 1,         // c
    StartOff = 1 << 2,             // x
    BlockKeys = 1 << 3,            // b
    BlockTriggers = 1 << 4,        // B
    InvBlockTriggers = 1 << 5,     // A
    SwitchCmdNum = 1 << 6,         // s
    UnlockHookgroupsKey = 1 << 7,  // h
    LockHookgroupsKey = 1 << 8,    // H
    Continuous = 1 << 9,           // t
    EngineTrigger = 1 << 10,       // E
}

export enum AnimationMode {
    RotationX = 1 << 0,
    RotationY = 1 << 1,
    RotationZ = 1 << 2,
    OffsetX = 1 << 3,
    OffsetY = 1 << 4,
    OffsetZ = 1 << 5,
    AutoAnimate = 1 << 6,
    NoFlip = 1 << 7,
    Bounce = 1 << 8,
    EventLock = 1 << 9,
}

//#endregion

//#region Enumerations

export enum WheelBraking {
    None = 0,
    FootHand = 1,
    FootHandSkidLeft = 2,
    FootHandSkidRight = 3,
    FootOnly = 4,
}

export enum WheelPropulsion {
    None = 0,
    Forward = 1,
    Backward = 2,
}

export type WheelSide = 'left' | 'right';

export enum FlareType {
    Headlight = 'f',
    BrakeLight = 'b',
    BlinkerLeft = 'l',
    BlinkerRight = 'r',
    ReverseLight = 'R',
    User = 'u',
    Dashboard = 'd',
}

export enum DifferentialType {
    Open = 'o',
    Locked = 'l',
    Split = 's',
    Viscous = 'v',
}

export enum MinimassOption {
    SkipLoaded = 'l',
    Dummy = 'n',
}

export enum EngineType {
    Truck = 't',
    Car = 'c',
    Electric = 'e',
}

export enum ManagedMaterialType {
    MeshStandard = 'mesh_standard',
    MeshTransparent = 'mesh_transparent',
    FlexmeshStandard = 'flexmesh_standard',
    FlexmeshTransparent = 'flexmesh_transparent',
}

export enum PropSpecial {
    None = 'none',
    MirrorLeft = 'leftmirror',
    MirrorRight = 'rightmirror',
    DashboardRight = 'dashboard-rh',
    DashboardLeft = 'dashboard',
    AeroPropSpin = 'spinprop',
    AeroPropBlade = 'pale',
    DriverSeat = 'seat',
    DriverSeat2 = 'seat2',
    Beacon = 'beacon',
    RedBeacon = 'redbeacon',
    Lightbar = 'lightb',
}

export enum AnimationSource {
    Airspeed = 'airspeed',
    VerticalVelocity = 'vvi',
    Altimeter100k = 'altimeter100k',
    Altimeter10k = 'altimeter10k',
    Altimeter1k = 'altimeter1k',
    AngleOfAttack = 'aoa',
    Flap = 'flap',
    AirBrake = 'airbrake',
    Roll = 'roll',
    Pitch = 'pitch',
    Brakes = 'brakes',
    Accel = 'accel',
    Clutch = 'clutch',
    Speedo = 'speedo',
    Tacho = 'tacho',
    Turbo = 'turbo',
    Parking = 'parking',
    ShiftLeftRight = 'shifterman1',
    ShiftBackForth = 'shifterman2',
    SequentialShift = 'sequential',
    ShifterLin = 'shifterlin',
    Torque = 'torque',
    Heading = 'heading',
    Difflock = 'difflock',
    BoatRudder = 'rudderboat',
    BoatThrottle = 'throttleboat',
    SteeringWheel = 'steeringwheel',
    Aileron = 'aileron',
    Elevator = 'elevator',
    AirRudder = 'rudderair',
    Permanent = 'permanent',
    Event = 'event',
}

export enum MotorSourceKind {
    AeroThrottle = 'throttle',
    AeroRpm = 'rpm',
    AeroTorque = 'aerotorq',
    AeroPitch = 'aeropit',
    AeroStatus = 'aerostatus',
}

export enum AnimatorOption {
    Visible = 'vis',
    Invisible = 'inv',
    Airspeed = 'airspeed',
    VerticalVelocity = 'vvi',
    Altimeter100k = 'altimeter100k',
    Altimeter10k = 'altimeter10k',
    Altimeter1k = 'altimeter1k',
    AngleOfAttack = 'aoa',
    Flap = 'flap',
    AirBrake = 'airbrake',
    Roll = 'roll',
    Pitch = 'pitch',
    Brakes = 'brakes',
    Accel = 'accel',
    Clutch = 'clutch',
    Speedo = 'speedo',
    Tacho = 'tacho',
    Turbo = 'turbo',
    Parking = 'parking',
    ShiftLeftRight = 'shifterman1',
    ShiftBackForth = 'shifterman2',
    SequentialShift = 'sequential',
    GearSelect = 'shifterlin',
    Torque = 'torque',
    Difflock = 'difflock',
    BoatRudder = 'rudderboat',
    BoatThrottle = 'throttleboat',
    ShortLimit = 'shortlimit',
    LongLimit = 'longlimit',
}

export enum AeroAnimatorOption {
    Throttle = 'throttle',
    Rpm = 'rpm',
    Torque = 'aerotorq',
    Pitch = 'aeropit',
    Status = 'aerostatus',
}

//#endregion

//#region Structure Elements

export interface Node {
    id: NodeId;
    position: Vec3;
    options: number;
    loadWeightOverride?: number;
    nodeDefaults: NodeDefaults;
    beamDefaults: BeamDefaults;
    defaultMinimass: DefaultMinimass;
    detacherGroup: number;
}

export interface Beam {
    nodes: [NodeRef, NodeRef];
    options: number;
    extensionBreakLimit?: number;
    defaults: BeamDefaults;
    detacherGroup: number;
}

export interface Shock {
    nodes: [NodeRef, NodeRef];
    springRate: number;
    damping: number;
    shortBound: number;
    longBound: number;
    precompression: number;
    options: number;
    beamDefaults: BeamDefaults;
    detacherGroup: number;
}

export interface Shock2 {
    nodes: [NodeRef, NodeRef];
    springIn: number;
    dampIn: number;
    progressFactorSpringIn: number;
    progressFactorDampIn: number;
    springOut: number;
    dampOut: number;
    progressFactorSpringOut: number;
    progressFactorDampOut: number;
    shortBound: number;
    longBound: number;
    precompression: number;
    options: number;
    beamDefaults: BeamDefaults;
    detacherGroup: number;
}

export interface Shock3 {
    nodes: [NodeRef, NodeRef];
    springIn: number;
    dampIn: number;
    dampInSlow: number;
    splitVelIn: number;
    dampInFast: number;
    springOut: number;
    dampOut: number;
    dampOutSlow: number;
    splitVelOut: number;
    dampOutFast: number;
    shortBound: number;
    longBound: number;
    precompression: number;
    options: number;
    beamDefaults: BeamDefaults;
    detacherGroup: number;
}

export interface Hydro {
    nodes: [NodeRef, NodeRef];
    lengtheningFactor: number;
    options: string;
    inertia: OptionalInertia;
    inertiaDefaults: Inertia;
    beamDefaults: BeamDefaults;
    detacherGroup: number;
}

export interface Command {
    /** 1 for `commands`, 2 for `commands2` */
    formatVersion: 1 | 2;
    nodes: [NodeRef, NodeRef];
    shortenRate: number;
    lengthenRate: number;
    maxContraction: number;
    maxExtension: number;
    contractKey: number;
    extendKey: number;
    description: string;
    optionInvisible: boolean;
    optionRope: boolean;
    optionNotFaster: boolean;
    optionAutoCenter: boolean;
    optionOnePress: boolean;
    optionOnePressCenter: boolean;
    inertia: OptionalInertia;
    affectEngine: number;
    needsEngine: boolean;
    playsSound: boolean;
    inertiaDefaults: Inertia;
    beamDefaults: BeamDefaults;
    detacherGroup: number;
}

export interface Rope {
    rootNode: NodeRef;
    endNode: NodeRef;
    invisible: boolean;
    beamDefaults: BeamDefaults;
    detacherGroup: number;
}

export interface Ropable {
    node: NodeRef;
    group: number;
    hasMultilock: boolean;
}

export interface Tie {
    rootNode: NodeRef;
    maxReachLength: number;
    autoShortenRate: number;
    minLength: number;
    maxLength: number;
    isInvisible: boolean;
    disableSelfLock: boolean;
    maxStress: number;
    group: number;
    beamDefaults: BeamDefaults;
    detacherGroup: number;
}

export type TriggerAction =
    | { kind: 'hookToggle'; contractionHookgroupId: number; extensionHookgroupId: number }
    | { kind: 'engine'; functionId: number; motorIndex: number }
    | { kind: 'commandKeys'; contractionKey: number; extensionKey: number };

export interface Trigger {
    nodes: [NodeRef, NodeRef];
    contractionTriggerLimit: number;
    expansionTriggerLimit: number;
    options: number;
    boundaryTimer: number;
    action: TriggerAction;
    beamDefaults: BeamDefaults;
    detacherGroup: number;
}

export interface Hook {
    node: NodeRef;
    hookRange: number;
    speedCoef: number;
    maxForce: number;
    hookGroup: number;
    lockGroup: number;
    timer: number;
    minRangeMeters: number;
    selfLock: boolean;
    autoLock: boolean;
    noDisable: boolean;
    noRope: boolean;
    visible: boolean;
}

export interface Lockgroup {
    number: number;
    nodes: NodeRef[];
}

export interface RailGroup {
    id: number;
    nodes: NodeRef[];
}

export enum SlideNodeConstraint {
    AttachAll = 1 << 0,
    AttachForeign = 1 << 1,
    AttachSelf = 1 << 2,
    AttachNone = 1 << 3,
}

export interface SlideNode {
    slideNode: NodeRef;
    railNodes: NodeRef[];
    springRate?: number;
    breakForce?: number;
    tolerance?: number;
    attachmentRate?: number;
    railgroupId?: number;
    maxAttachDistance?: number;
    constraintFlags: number;
}

export interface CollisionBox {
    nodes: NodeRef[];
}

export interface AeroAnimator {
    flags: Set<AeroAnimatorOption>;
    engineIndex: number;
}

export interface Animator {
    nodes: [NodeRef, NodeRef];
    lengtheningFactor: number;
    flags: Set<AnimatorOption>;
    shortLimit: number;
    longLimit: number;
    aeroAnimator: AeroAnimator;
    inertiaDefaults: Inertia;
    beamDefaults: BeamDefaults;
    detacherGroup: number;
}

export interface Rotator {
    axisNodes: [NodeRef, NodeRef];
    basePlateNodes: [NodeRef, NodeRef, NodeRef, NodeRef];
    rotatingPlateNodes: [NodeRef, NodeRef, NodeRef, NodeRef];
    rate: number;
    spinLeftKey: number;
    spinRightKey: number;
    /** rotators2 only */
    rotatingForce?: number;
    tolerance?: number;
    description?: string;
    inertia: OptionalInertia;
    engineCoupling: number;
    needsEngine: boolean;
    inertiaDefaults: Inertia;
}

export interface Minimass {
    globalMinMassKg: number;
    option: MinimassOption;
}

export interface Cinecam {
    position: Vec3;
    nodes: [NodeRef, NodeRef, NodeRef, NodeRef, NodeRef, NodeRef, NodeRef, NodeRef];
    spring: number;
    damping: number;
    nodeMass: number;
    generatedNodes?: GeneratedNodeRange;
    nodeDefaults: NodeDefaults;
    beamDefaults: BeamDefaults;
}

//#endregion

//#region Wheel Elements

interface WheelCommon {
    numRays: number;
    nodes: [NodeRef, NodeRef];
    rigidityNode: NodeRef;
    braking: WheelBraking;
    propulsion: WheelPropulsion;
    referenceArmNode: NodeRef;
    mass: number;
    generatedNodes?: GeneratedNodeRange;
    nodeDefaults: NodeDefaults;
    beamDefaults: BeamDefaults;
}

export interface Wheel extends WheelCommon {
    radius: number;
    width: number;
    springiness: number;
    damping: number;
    faceMaterialName: string;
    bandMaterialName: string;
}

export interface Wheel2 extends WheelCommon {
    rimRadius: number;
    tyreRadius: number;
    width: number;
    rimSpringiness: number;
    rimDamping: number;
    tyreSpringiness: number;
    tyreDamping: number;
    faceMaterialName: string;
    bandMaterialName: string;
}

export interface MeshWheel extends WheelCommon {
    isMeshwheel2: boolean;
    tyreRadius: number;
    rimRadius: number;
    width: number;
    spring: number;
    damping: number;
    side: WheelSide;
    meshName: string;
    materialName: string;
}

export interface FlexBodyWheel extends WheelCommon {
    tyreRadius: number;
    rimRadius: number;
    width: number;
    tyreSpringiness: number;
    tyreDamping: number;
    rimSpringiness: number;
    rimDamping: number;
    side: WheelSide;
    rimMeshName: string;
    tyreMeshName: string;
}

export interface WheelDetacher {
    wheelId: number;
    detacherGroup: number;
}

export interface Axle {
    wheels: [[NodeRef, NodeRef] | null, [NodeRef, NodeRef] | null];
    options: DifferentialType[];
}

export interface InterAxle {
    a1: number;
    a2: number;
    options: DifferentialType[];
}

export interface TransferCase {
    a1: number;
    a2: number;
    has2wd: boolean;
    has2wdLo: boolean;
    gearRatios: number[];
}

export interface Brakes {
    defaultBrakingForce: number;
    parkingBrakeForce: number;
}

export interface TractionControl {
    regulationForce: number;
    wheelSlip: number;
    fadeSpeed: number;
    pulsePerSec: number;
    attrIsOn: boolean;
    attrNoDashboard: boolean;
    attrNoToggle: boolean;
}

export interface AntiLockBrakes {
    regulationForce: number;
    minSpeed: number;
    pulsePerSec: number;
    attrIsOn: boolean;
    attrNoDashboard: boolean;
    attrNoToggle: boolean;
}

export interface CruiseControl {
    minSpeed: number;
    autobrake: number;
}

export interface SpeedLimiter {
    isEnabled: boolean;
    maxSpeed: number;
}

//#endregion

//#region Engine Elements

export interface Engine {
    shiftDownRpm: number;
    shiftUpRpm: number;
    torque: number;
    globalGearRatio: number;
    reverseGearRatio: number;
    neutralGearRatio: number;
    gearRatios: number[];
}

export interface Engoption {
    inertia: number;
    type: EngineType;
    clutchForce: number;
    shiftTime: number;
    clutchTime: number;
    postShiftTime: number;
    stallRpm: number;
    idleRpm: number;
    maxIdleMixture: number;
    minIdleMixture: number;
    brakingTorque: number;
}

export interface Engturbo {
    version: number;
    tinertiaFactor: number;
    nturbos: number;
    /** param1..param11 in declaration order; only those present in the file */
    params: number[];
}

export interface TorqueCurveSample {
    power: number;
    torquePercent: number;
}

export interface TorqueCurve {
    predefinedFuncName: string;
    samples: TorqueCurveSample[];
}

//#endregion

//#region Aero Elements

export interface Wing {
    nodes: [NodeRef, NodeRef, NodeRef, NodeRef, NodeRef, NodeRef, NodeRef, NodeRef];
    texCoords: number[];
    controlSurface: string;
    chordPoint: number;
    minDeflection: number;
    maxDeflection: number;
    airfoil: string;
    efficacyCoef: number;
}

export interface Airbrake {
    referenceNode: NodeRef;
    xAxisNode: NodeRef;
    yAxisNode: NodeRef;
    additionalNode: NodeRef;
    offset: Vec3;
    width: number;
    height: number;
    maxInclinationAngle: number;
    texcoordX1: number;
    texcoordY1: number;
    texcoordX2: number;
    texcoordY2: number;
}

export interface Fusedrag {
    frontNode: NodeRef;
    rearNode: NodeRef;
    autocalc: boolean;
    approximateWidth: number;
    areaCoefficient: number;
    airfoilName: string;
}

export interface Turboprop {
    /** 1 for `turboprops`, 2 for `turboprops2` */
    formatVersion: 1 | 2;
    referenceNode: NodeRef;
    axisNode: NodeRef;
    bladeTipNodes: [NodeRef, NodeRef, NodeRef, NodeRef];
    coupleNode: NodeRef;
    turbinePowerKw: number;
    airfoil: string;
}

export interface Pistonprop {
    referenceNode: NodeRef;
    axisNode: NodeRef;
    bladeTipNodes: [NodeRef, NodeRef, NodeRef, NodeRef];
    coupleNode: NodeRef;
    turbinePowerKw: number;
    pitch: number;
    airfoil: string;
}

export interface Turbojet {
    frontNode: NodeRef;
    backNode: NodeRef;
    sideNode: NodeRef;
    isReversable: boolean;
    dryThrust: number;
    wetThrust: number;
    frontDiameter: number;
    backDiameter: number;
    nozzleLength: number;
}

export interface Screwprop {
    propNode: NodeRef;
    backNode: NodeRef;
    topNode: NodeRef;
    power: number;
}

//#endregion

//#region Visual Elements

export interface MotorSource {
    source: MotorSourceKind;
    motor: number;
}

export interface Animation {
    ratio: number;
    lowerLimit: number;
    upperLimit: number;
    mode: number;
    sources: Set<AnimationSource>;
    motorSources: MotorSource[];
    event: string;
}

export interface Prop {
    referenceNode: NodeRef;
    xAxisNode: NodeRef;
    yAxisNode: NodeRef;
    offset: Vec3;
    rotation: Vec3;
    meshName: string;
    special: PropSpecial;
    beacon?: { flareMaterialName: string; color: [number, number, number] };
    dashboard?: { meshName: string; offset?: Vec3; rotationAngle: number };
    animations: Animation[];
    cameraSettings: CameraSettings;
}

export interface Flexbody {
    referenceNode: NodeRef;
    xAxisNode: NodeRef;
    yAxisNode: NodeRef;
    offset: Vec3;
    rotation: Vec3;
    meshName: string;
    nodeListToImport: NodeRange[];
    cameraSettings: CameraSettings;
}

export interface Flare {
    referenceNode: NodeRef;
    nodeAxisX: NodeRef;
    nodeAxisY: NodeRef;
    offset: Vec3;
    type: FlareType;
    controlNumber: number;
    dashboardLink: string;
    blinkDelayMs: number;
    size: number;
    materialName: string;
}

export interface MaterialFlareBinding {
    flareNumber: number;
    materialName: string;
}

export interface ManagedMaterial {
    name: string;
    type: ManagedMaterialType;
    diffuseMap: string;
    damagedDiffuseMap: string;
    specularMap: string;
    options: ManagedMaterialsOptions;
}

export interface Texcoord {
    node: NodeRef;
    u: number;
    v: number;
}

export interface Cab {
    nodes: [NodeRef, NodeRef, NodeRef];
    options: number;
}

export interface Submesh {
    backmesh: boolean;
    texcoords: Texcoord[];
    cabTriangles: Cab[];
}

export interface Exhaust {
    referenceNode: NodeRef;
    directionNode: NodeRef;
    particleName: string;
}

export interface Particle {
    emitterNode: NodeRef;
    referenceNode: NodeRef;
    particleSystemName: string;
}

export interface VideoCamera {
    referenceNode: NodeRef;
    leftNode: NodeRef;
    bottomNode: NodeRef;
    altReferenceNode: NodeRef;
    altOrientationNode: NodeRef;
    offset: Vec3;
    rotation: Vec3;
    fieldOfView: number;
    textureWidth: number;
    textureHeight: number;
    minClipDistance: number;
    maxClipDistance: number;
    cameraRole: number;
    cameraMode: number;
    materialName: string;
    cameraName: string;
}

export interface Camera {
    centerNode: NodeRef;
    backNode: NodeRef;
    leftNode: NodeRef;
}

export interface CameraRail {
    nodes: NodeRef[];
}

export interface SoundSource {
    node: NodeRef;
    soundScriptName: string;
}

export type SoundSourceMode =
    | { mode: 'always' }
    | { mode: 'outside' }
    | { mode: 'cinecam'; cinecamIndex: number };

export interface SoundSource2 extends SoundSource {
    mode: SoundSourceMode;
}

export interface SkeletonSettings {
    visibilityRangeMeters: number;
    beamThicknessMeters: number;
}

export type ExtCamera =
    | { mode: 'classic' }
    | { mode: 'cinecam' }
    | { mode: 'node'; node: NodeRef };

//#endregion

//#region Metadata Elements

export interface Author {
    type: string;
    forumAccountId?: number;
    name: string;
    email: string;
}

export interface Fileinfo {
    uniqueId: string;
    categoryId: number;
    fileVersion: number;
}

export interface Globals {
    dryMass: number;
    cargoMass: number;
    materialName: string;
}

export interface GuiSetting {
    key: string;
    value: string;
}

export interface Help {
    material: string;
}

export interface CollisionRange {
    nodeCollisionRange: number;
}

//#endregion

//#region Module and Document

export const ROOT_MODULE_NAME = '_Root_';

/**
 * One named group of element collections
 */
export class RigModule {
    readonly airbrakes: Airbrake[] = [];
    readonly animators: Animator[] = [];
    readonly antiLockBrakes: AntiLockBrakes[] = [];
    readonly author: Author[] = [];
    readonly axles: Axle[] = [];
    readonly beams: Beam[] = [];
    readonly brakes: Brakes[] = [];
    readonly cameraRails: CameraRail[] = [];
    readonly cameras: Camera[] = [];
    readonly cinecams: Cinecam[] = [];
    readonly collisionBoxes: CollisionBox[] = [];
    readonly collisionRanges: CollisionRange[] = [];
    readonly commands: Command[] = [];
    readonly contacters: NodeRef[] = [];
    readonly cruiseControl: CruiseControl[] = [];
    readonly description: string[] = [];
    readonly engines: Engine[] = [];
    readonly engoptions: Engoption[] = [];
    readonly engturbos: Engturbo[] = [];
    readonly exhausts: Exhaust[] = [];
    extCamera?: ExtCamera;
    readonly fileFormatVersion: number[] = [];
    readonly fileinfo: Fileinfo[] = [];
    readonly fixes: NodeRef[] = [];
    readonly flares: Flare[] = [];
    readonly flexbodies: Flexbody[] = [];
    readonly flexBodyWheels: FlexBodyWheel[] = [];
    readonly fusedrag: Fusedrag[] = [];
    readonly globals: Globals[] = [];
    readonly guid: string[] = [];
    readonly guiSettings: GuiSetting[] = [];
    readonly help: Help[] = [];
    readonly hooks: Hook[] = [];
    readonly hydros: Hydro[] = [];
    readonly interAxles: InterAxle[] = [];
    readonly lockgroups: Lockgroup[] = [];
    readonly managedMaterials: ManagedMaterial[] = [];
    readonly materialFlareBindings: MaterialFlareBinding[] = [];
    readonly meshWheels: MeshWheel[] = [];
    readonly minimass: Minimass[] = [];
    readonly nodes: Node[] = [];
    readonly particles: Particle[] = [];
    readonly pistonprops: Pistonprop[] = [];
    readonly props: Prop[] = [];
    readonly railGroups: RailGroup[] = [];
    readonly ropables: Ropable[] = [];
    readonly ropes: Rope[] = [];
    readonly rotators: Rotator[] = [];
    readonly rotators2: Rotator[] = [];
    readonly screwprops: Screwprop[] = [];
    readonly shocks: Shock[] = [];
    readonly shocks2: Shock2[] = [];
    readonly shocks3: Shock3[] = [];
    skeletonSettings?: SkeletonSettings;
    readonly slideNodes: SlideNode[] = [];
    readonly soundSources: SoundSource[] = [];
    readonly soundSources2: SoundSource2[] = [];
    readonly speedLimiter: SpeedLimiter[] = [];
    readonly submeshes: Submesh[] = [];
    readonly submeshGroundModel: string[] = [];
    readonly ties: Tie[] = [];
    torqueCurve?: TorqueCurve;
    readonly tractionControl: TractionControl[] = [];
    readonly transferCase: TransferCase[] = [];
    readonly triggers: Trigger[] = [];
    readonly turbojets: Turbojet[] = [];
    readonly turboprops: Turboprop[] = [];
    readonly videoCameras: VideoCamera[] = [];
    readonly wheelDetachers: WheelDetacher[] = [];
    readonly wheels: Wheel[] = [];
    readonly wheels2: Wheel2[] = [];
    readonly wings: Wing[] = [];

    constructor(public readonly name: string) {}
}

/**
 * Global switches set by argument-less directives
 */
export interface DocumentFlags {
    disableDefaultSounds: boolean;
    enableAdvancedDeformation: boolean;
    forwardCommands: boolean;
    importCommands: boolean;
    hideInChooser: boolean;
    lockgroupDefaultNolock: boolean;
    rescuer: boolean;
    rollon: boolean;
    slideNodesConnectInstantly: boolean;
}

export class RigDocument {
    /** Title: first non-comment line of the file */
    name = '';
    readonly flags: DocumentFlags = {
        disableDefaultSounds: false,
        enableAdvancedDeformation: false,
        forwardCommands: false,
        importCommands: false,
        hideInChooser: false,
        lockgroupDefaultNolock: false,
        rescuer: false,
        rollon: false,
        slideNodesConnectInstantly: false,
    };
    readonly root = new RigModule(ROOT_MODULE_NAME);
    readonly userModules = new Map<string, RigModule>();

    /** Root module followed by user modules in declaration order */
    allModules(): RigModule[] {
        return [this.root, ...this.userModules.values()];
    }
}

//#endregion
