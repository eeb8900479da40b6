/**
 * @file keywords.ts
 * Closed set of rig file keywords and the line-start matcher
 */

//#region Keyword Set

/**
 * Every keyword the rig format knows. The value is the spelling used in files.
 */
export enum Keyword {
    ADD_ANIMATION = 'add_animation',
    AIRBRAKES = 'airbrakes',
    ANIMATORS = 'animators',
    ANTI_LOCK_BRAKES = 'AntiLockBrakes',
    AUTHOR = 'author',
    AXLES = 'axles',
    BACKMESH = 'backmesh',
    BEAMS = 'beams',
    BRAKES = 'brakes',
    CAB = 'cab',
    CAMERARAIL = 'camerarail',
    CAMERAS = 'cameras',
    CINECAM = 'cinecam',
    COLLISIONBOXES = 'collisionboxes',
    COMMANDS = 'commands',
    COMMANDS2 = 'commands2',
    COMMENT = 'comment',
    CONTACTERS = 'contacters',
    CRUISECONTROL = 'cruisecontrol',
    DESCRIPTION = 'description',
    DETACHER_GROUP = 'detacher_group',
    DISABLEDEFAULTSOUNDS = 'disabledefaultsounds',
    ENABLE_ADVANCED_DEFORMATION = 'enable_advanced_deformation',
    END = 'end',
    END_COMMENT = 'end_comment',
    END_DESCRIPTION = 'end_description',
    END_SECTION = 'end_section',
    ENGINE = 'engine',
    ENGOPTION = 'engoption',
    ENGTURBO = 'engturbo',
    ENVMAP = 'envmap',
    EXHAUSTS = 'exhausts',
    EXTCAMERA = 'extcamera',
    FILEFORMATVERSION = 'fileformatversion',
    FILEINFO = 'fileinfo',
    FIXES = 'fixes',
    FLARES = 'flares',
    FLARES2 = 'flares2',
    FLEXBODIES = 'flexbodies',
    FLEXBODY_CAMERA_MODE = 'flexbody_camera_mode',
    FLEXBODYWHEELS = 'flexbodywheels',
    FORSET = 'forset',
    FORWARDCOMMANDS = 'forwardcommands',
    FUSEDRAG = 'fusedrag',
    GLOBALS = 'globals',
    GUID = 'guid',
    GUISETTINGS = 'guisettings',
    HELP = 'help',
    HIDE_IN_CHOOSER = 'hideInChooser',
    HOOKGROUP = 'hookgroup',
    HOOKS = 'hooks',
    HYDROS = 'hydros',
    IMPORTCOMMANDS = 'importcommands',
    INTERAXLES = 'interaxles',
    LOCKGROUPS = 'lockgroups',
    LOCKGROUP_DEFAULT_NOLOCK = 'lockgroup_default_nolock',
    MANAGEDMATERIALS = 'managedmaterials',
    MATERIALFLAREBINDINGS = 'materialflarebindings',
    MESHWHEELS = 'meshwheels',
    MESHWHEELS2 = 'meshwheels2',
    MINIMASS = 'minimass',
    NODECOLLISION = 'nodecollision',
    NODES = 'nodes',
    NODES2 = 'nodes2',
    PARTICLES = 'particles',
    PISTONPROPS = 'pistonprops',
    PROP_CAMERA_MODE = 'prop_camera_mode',
    PROPS = 'props',
    RAILGROUPS = 'railgroups',
    RESCUER = 'rescuer',
    RIGIDIFIERS = 'rigidifiers',
    ROLLON = 'rollon',
    ROPABLES = 'ropables',
    ROPES = 'ropes',
    ROTATORS = 'rotators',
    ROTATORS2 = 'rotators2',
    SCREWPROPS = 'screwprops',
    SECTION = 'section',
    SECTIONCONFIG = 'sectionconfig',
    SET_BEAM_DEFAULTS = 'set_beam_defaults',
    SET_BEAM_DEFAULTS_SCALE = 'set_beam_defaults_scale',
    SET_COLLISION_RANGE = 'set_collision_range',
    SET_DEFAULT_MINIMASS = 'set_default_minimass',
    SET_INERTIA_DEFAULTS = 'set_inertia_defaults',
    SET_MANAGEDMATERIALS_OPTIONS = 'set_managedmaterials_options',
    SET_NODE_DEFAULTS = 'set_node_defaults',
    SET_SHADOWS = 'set_shadows',
    SET_SKELETON_SETTINGS = 'set_skeleton_settings',
    SHOCKS = 'shocks',
    SHOCKS2 = 'shocks2',
    SHOCKS3 = 'shocks3',
    SLIDENODE_CONNECT_INSTANTLY = 'slidenode_connect_instantly',
    SLIDENODES = 'slidenodes',
    SOUNDSOURCES = 'soundsources',
    SOUNDSOURCES2 = 'soundsources2',
    SPEEDLIMITER = 'speedlimiter',
    SUBMESH = 'submesh',
    SUBMESH_GROUNDMODEL = 'submesh_groundmodel',
    TEXCOORDS = 'texcoords',
    TIES = 'ties',
    TORQUECURVE = 'torquecurve',
    TRACTION_CONTROL = 'TractionControl',
    TRANSFERCASE = 'transfercase',
    TRIGGERS = 'triggers',
    TURBOJETS = 'turbojets',
    TURBOPROPS = 'turboprops',
    TURBOPROPS2 = 'turboprops2',
    VIDEOCAMERA = 'videocamera',
    WHEELDETACHERS = 'wheeldetachers',
    WHEELS = 'wheels',
    WHEELS2 = 'wheels2',
    WINGS = 'wings',
}

/** Name used in diagnostics when no keyword is in effect. */
export const NO_KEYWORD = 'none';

//#endregion

//#region Matcher

const ALL_KEYWORDS: readonly Keyword[] = Object.values(Keyword);

const EXACT = new Map<string, Keyword>(ALL_KEYWORDS.map(k => [k, k]));
const FOLDED = new Map<string, Keyword>(ALL_KEYWORDS.map(k => [k.toLowerCase(), k]));

function escapeForPattern(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

// Longest spellings first so that e.g. 'nodes2' is tried before 'nodes'.
const ALTERNATIVES = [...ALL_KEYWORDS]
    .sort((a, b) => b.length - a.length)
    .map(escapeForPattern)
    .join('|');

const CASE_SENSITIVE_PATTERN = new RegExp(`^(${ALTERNATIVES})(?=[ \\t:|,]|$)`);
const CASE_INSENSITIVE_PATTERN = new RegExp(`^(${ALTERNATIVES})(?=[ \\t:|,]|$)`, 'i');

/**
 * Result of a successful keyword match
 */
export interface KeywordMatch {
    keyword: Keyword;
    /** Length of the keyword as written on the line */
    length: number;
}

/**
 * Identify the keyword a line starts with, if any. Lines whose first
 * character is not a letter are never keyword lines. Case-sensitive
 * spelling wins over a case-insensitive match.
 */
export function identifyKeyword(line: string): KeywordMatch | null {
    const first = line.charAt(0).toLowerCase();
    if (first < 'a' || first > 'z') {
        return null;
    }

    const exact = CASE_SENSITIVE_PATTERN.exec(line);
    if (exact) {
        const keyword = EXACT.get(exact[1]);
        if (keyword) {
            return { keyword, length: exact[1].length };
        }
    }

    const folded = CASE_INSENSITIVE_PATTERN.exec(line);
    if (folded) {
        const keyword = FOLDED.get(folded[1].toLowerCase());
        if (keyword) {
            return { keyword, length: folded[1].length };
        }
    }
    return null;
}

//#endregion
