/**
 * @file keywordtable.ts
 * Behaviour of every keyword: what the dispatcher does when a line starts with it
 */

import * as aero from './aerosections';
import * as directives from './directives';
import * as engine from './enginesections';
import { Keyword } from './keywords';
import { LineHandler } from './parsercontext';
import { DocumentFlags } from './rigdef';
import * as structure from './structuresections';
import * as visual from './visualsections';
import * as wheels from './wheelsections';

//#region Behaviours

/**
 * What a keyword line does:
 * - `flag`: sets a document flag
 * - `directive`: runs a one-line handler; the open block stays open
 * - `section`: opens a block whose data lines go to `extractor`;
 *   `raw` blocks are not tokenized and only recognise their closing keywords
 * - `end`: closes the open block
 * - `module`: switches the active module
 * - `ignored`: obsolete, skipped silently
 */
export type KeywordBehavior =
    | { kind: 'flag'; flag: keyof DocumentFlags }
    | { kind: 'directive'; handler: LineHandler }
    | { kind: 'section'; extractor: LineHandler; raw?: boolean }
    | { kind: 'end' }
    | { kind: 'module' }
    | { kind: 'ignored' };

const flag = (name: keyof DocumentFlags): KeywordBehavior => ({ kind: 'flag', flag: name });
const directive = (handler: LineHandler): KeywordBehavior => ({ kind: 'directive', handler });
const section = (extractor: LineHandler): KeywordBehavior => ({ kind: 'section', extractor });
const END: KeywordBehavior = { kind: 'end' };
const MODULE: KeywordBehavior = { kind: 'module' };
const IGNORED: KeywordBehavior = { kind: 'ignored' };

const dropLine: LineHandler = () => { /* comment text */ };

//#endregion

//#region Table

export const KEYWORD_TABLE: Readonly<Record<Keyword, KeywordBehavior>> = {
    [Keyword.ADD_ANIMATION]: directive(visual.parseDirectiveAddAnimation),
    [Keyword.AIRBRAKES]: section(aero.parseAirbrakes),
    [Keyword.ANIMATORS]: section(structure.parseAnimators),
    [Keyword.ANTI_LOCK_BRAKES]: directive(wheels.parseAntiLockBrakes),
    [Keyword.AUTHOR]: directive(directives.parseAuthor),
    [Keyword.AXLES]: section(wheels.parseAxles),
    [Keyword.BACKMESH]: directive(visual.parseDirectiveBackmesh),
    [Keyword.BEAMS]: section(structure.parseBeams),
    [Keyword.BRAKES]: section(wheels.parseBrakes),
    [Keyword.CAB]: section(visual.parseCab),
    [Keyword.CAMERARAIL]: section(visual.parseCameraRail),
    [Keyword.CAMERAS]: section(visual.parseCameras),
    [Keyword.CINECAM]: section(structure.parseCinecam),
    [Keyword.COLLISIONBOXES]: section(structure.parseCollisionBoxes),
    [Keyword.COMMANDS]: section(structure.parseCommands),
    [Keyword.COMMANDS2]: section(structure.parseCommands),
    [Keyword.COMMENT]: { kind: 'section', extractor: dropLine, raw: true },
    [Keyword.CONTACTERS]: section(structure.parseContacters),
    [Keyword.CRUISECONTROL]: directive(wheels.parseCruiseControl),
    [Keyword.DESCRIPTION]: { kind: 'section', extractor: directives.parseDescription, raw: true },
    [Keyword.DETACHER_GROUP]: directive(directives.parseDetacherGroup),
    [Keyword.DISABLEDEFAULTSOUNDS]: flag('disableDefaultSounds'),
    [Keyword.ENABLE_ADVANCED_DEFORMATION]: flag('enableAdvancedDeformation'),
    [Keyword.END]: END,
    [Keyword.END_COMMENT]: END,
    [Keyword.END_DESCRIPTION]: END,
    [Keyword.END_SECTION]: MODULE,
    [Keyword.ENGINE]: section(engine.parseEngine),
    [Keyword.ENGOPTION]: section(engine.parseEngoption),
    [Keyword.ENGTURBO]: section(engine.parseEngturbo),
    [Keyword.ENVMAP]: IGNORED,
    [Keyword.EXHAUSTS]: section(visual.parseExhausts),
    [Keyword.EXTCAMERA]: directive(visual.parseExtCamera),
    [Keyword.FILEFORMATVERSION]: directive(directives.parseFileFormatVersion),
    [Keyword.FILEINFO]: directive(directives.parseFileinfo),
    [Keyword.FIXES]: section(structure.parseFixes),
    [Keyword.FLARES]: section(visual.parseFlares),
    [Keyword.FLARES2]: section(visual.parseFlares),
    [Keyword.FLEXBODIES]: section(visual.parseFlexbodies),
    [Keyword.FLEXBODY_CAMERA_MODE]: directive(visual.parseDirectiveFlexbodyCameraMode),
    [Keyword.FLEXBODYWHEELS]: section(wheels.parseFlexBodyWheels),
    [Keyword.FORSET]: directive(visual.parseDirectiveForset),
    [Keyword.FORWARDCOMMANDS]: flag('forwardCommands'),
    [Keyword.FUSEDRAG]: section(aero.parseFusedrag),
    [Keyword.GLOBALS]: section(directives.parseGlobals),
    [Keyword.GUID]: directive(directives.parseGuid),
    [Keyword.GUISETTINGS]: section(directives.parseGuiSettings),
    [Keyword.HELP]: section(directives.parseHelp),
    [Keyword.HIDE_IN_CHOOSER]: flag('hideInChooser'),
    [Keyword.HOOKGROUP]: IGNORED,
    [Keyword.HOOKS]: section(structure.parseHooks),
    [Keyword.HYDROS]: section(structure.parseHydros),
    [Keyword.IMPORTCOMMANDS]: flag('importCommands'),
    [Keyword.INTERAXLES]: section(wheels.parseInterAxles),
    [Keyword.LOCKGROUPS]: section(structure.parseLockgroups),
    [Keyword.LOCKGROUP_DEFAULT_NOLOCK]: flag('lockgroupDefaultNolock'),
    [Keyword.MANAGEDMATERIALS]: section(visual.parseManagedMaterials),
    [Keyword.MATERIALFLAREBINDINGS]: section(visual.parseMaterialFlareBindings),
    [Keyword.MESHWHEELS]: section(wheels.parseMeshWheels),
    [Keyword.MESHWHEELS2]: section(wheels.parseMeshWheels),
    [Keyword.MINIMASS]: section(structure.parseMinimass),
    [Keyword.NODECOLLISION]: IGNORED,
    [Keyword.NODES]: section(structure.parseNodes),
    [Keyword.NODES2]: section(structure.parseNodes),
    [Keyword.PARTICLES]: section(visual.parseParticles),
    [Keyword.PISTONPROPS]: section(aero.parsePistonprops),
    [Keyword.PROP_CAMERA_MODE]: directive(visual.parseDirectivePropCameraMode),
    [Keyword.PROPS]: section(visual.parseProps),
    [Keyword.RAILGROUPS]: section(structure.parseRailGroups),
    [Keyword.RESCUER]: flag('rescuer'),
    [Keyword.RIGIDIFIERS]: IGNORED,
    [Keyword.ROLLON]: flag('rollon'),
    [Keyword.ROPABLES]: section(structure.parseRopables),
    [Keyword.ROPES]: section(structure.parseRopes),
    [Keyword.ROTATORS]: section(structure.parseRotators),
    [Keyword.ROTATORS2]: section(structure.parseRotators),
    [Keyword.SCREWPROPS]: section(aero.parseScrewprops),
    [Keyword.SECTION]: MODULE,
    [Keyword.SECTIONCONFIG]: IGNORED,
    [Keyword.SET_BEAM_DEFAULTS]: directive(directives.parseSetBeamDefaults),
    [Keyword.SET_BEAM_DEFAULTS_SCALE]: directive(directives.parseSetBeamDefaultsScale),
    [Keyword.SET_COLLISION_RANGE]: directive(directives.parseSetCollisionRange),
    [Keyword.SET_DEFAULT_MINIMASS]: directive(directives.parseSetDefaultMinimass),
    [Keyword.SET_INERTIA_DEFAULTS]: directive(directives.parseSetInertiaDefaults),
    [Keyword.SET_MANAGEDMATERIALS_OPTIONS]: directive(directives.parseSetManagedMaterialsOptions),
    [Keyword.SET_NODE_DEFAULTS]: directive(directives.parseSetNodeDefaults),
    [Keyword.SET_SHADOWS]: IGNORED,
    [Keyword.SET_SKELETON_SETTINGS]: directive(visual.parseSetSkeletonSettings),
    [Keyword.SHOCKS]: section(structure.parseShocks),
    [Keyword.SHOCKS2]: section(structure.parseShocks2),
    [Keyword.SHOCKS3]: section(structure.parseShocks3),
    [Keyword.SLIDENODE_CONNECT_INSTANTLY]: flag('slideNodesConnectInstantly'),
    [Keyword.SLIDENODES]: section(structure.parseSlideNodes),
    [Keyword.SOUNDSOURCES]: section(visual.parseSoundSources),
    [Keyword.SOUNDSOURCES2]: section(visual.parseSoundSources2),
    [Keyword.SPEEDLIMITER]: directive(wheels.parseSpeedLimiter),
    [Keyword.SUBMESH]: directive(visual.parseDirectiveSubmesh),
    [Keyword.SUBMESH_GROUNDMODEL]: directive(visual.parseSubmeshGroundModel),
    [Keyword.TEXCOORDS]: section(visual.parseTexcoords),
    [Keyword.TIES]: section(structure.parseTies),
    [Keyword.TORQUECURVE]: section(engine.parseTorqueCurve),
    [Keyword.TRACTION_CONTROL]: directive(wheels.parseTractionControl),
    [Keyword.TRANSFERCASE]: section(wheels.parseTransferCase),
    [Keyword.TRIGGERS]: section(structure.parseTriggers),
    [Keyword.TURBOJETS]: section(aero.parseTurbojets),
    [Keyword.TURBOPROPS]: section(aero.parseTurboprops),
    [Keyword.TURBOPROPS2]: section(aero.parseTurboprops),
    [Keyword.VIDEOCAMERA]: section(visual.parseVideoCamera),
    [Keyword.WHEELDETACHERS]: section(wheels.parseWheelDetachers),
    [Keyword.WHEELS]: section(wheels.parseWheels),
    [Keyword.WHEELS2]: section(wheels.parseWheels2),
    [Keyword.WINGS]: section(aero.parseWings),
};

/** Keywords that close a raw (comment or description) block */
export const RAW_BLOCK_TERMINATORS: ReadonlySet<Keyword> = new Set([
    Keyword.END,
    Keyword.END_COMMENT,
    Keyword.END_DESCRIPTION,
]);

//#endregion
