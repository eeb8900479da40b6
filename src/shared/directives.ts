/**
 * @file directives.ts
 * Handlers for one-line directives (defaults, metadata, detacher groups)
 * and the metadata sections `globals`, `guisettings`, `help` and `description`
 */

import { BeamDefaultsArgs, InertiaDefaultsArgs } from './defaults';
import { LineHandler } from './parsercontext';
import { Author, Fileinfo } from './rigdef';
import { NODE_OPTIONS } from './structuresections';

/** Files declaring this format version or newer address nodes by name only */
export const NAMED_ONLY_FORMAT_VERSION = 450;

//#region Defaults Directives

export const parseSetNodeDefaults: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.defaults.setNodeDefaults({
        loadWeight: ctx.getArgFloat(1),
        friction: ctx.numArgs > 2 ? ctx.getArgFloat(2) : undefined,
        volume: ctx.numArgs > 3 ? ctx.getArgFloat(3) : undefined,
        surface: ctx.numArgs > 4 ? ctx.getArgFloat(4) : undefined,
        options: ctx.numArgs > 5
            ? ctx.foldOptions(ctx.getArgStr(5), NODE_OPTIONS, c => `invalid option '${c}'`)
            : 0,
    });
};

export const parseSetBeamDefaults: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const args: BeamDefaultsArgs = { springiness: ctx.getArgFloat(1) };
    if (ctx.numArgs > 2) { args.dampingConstant = ctx.getArgFloat(2); }
    if (ctx.numArgs > 3) { args.deformationThreshold = ctx.getArgFloat(3); }
    if (ctx.numArgs > 4) { args.breakingThreshold = ctx.getArgFloat(4); }
    if (ctx.numArgs > 5) { args.visualBeamDiameter = ctx.getArgFloat(5); }
    if (ctx.numArgs > 6) { args.beamMaterialName = ctx.getArgStr(6); }
    if (ctx.numArgs > 7) { args.plasticDeformCoef = ctx.getArgFloat(7); }

    ctx.defaults.setBeamDefaults(args, ctx.document.flags.enableAdvancedDeformation);
};

export const parseSetBeamDefaultsScale: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(5)) { return; }

    ctx.defaults.setBeamDefaultsScale({
        springiness: ctx.getArgFloat(1),
        dampingConstant: ctx.getArgFloat(2),
        deformationThresholdConstant: ctx.getArgFloat(3),
        breakingThresholdConstant: ctx.getArgFloat(4),
    });
};

export const parseSetInertiaDefaults: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const args: InertiaDefaultsArgs = { startDelayFactor: ctx.getArgFloat(1) };
    if (ctx.numArgs > 2) { args.stopDelayFactor = ctx.getArgFloat(2); }
    if (ctx.numArgs > 3) { args.startFunction = ctx.getArgStr(3); }
    if (ctx.numArgs > 4) { args.stopFunction = ctx.getArgStr(4); }

    ctx.defaults.setInertiaDefaults(args);
};

export const parseSetManagedMaterialsOptions: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.defaults.setManagedMaterialsOptions(ctx.getArgChar(1) !== '0');
};

export const parseSetDefaultMinimass: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.defaults.setDefaultMinimass(ctx.getArgFloat(1));
};

export const parseDetacherGroup: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.defaults.setDetacherGroup(ctx.getArgStr(1) === 'end' ? 0 : ctx.getArgInt(1));
};

export const parseSetCollisionRange: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.module.collisionRanges.push({ nodeCollisionRange: ctx.getArgFloat(1) });
};

//#endregion

//#region Metadata Directives

export const parseFileFormatVersion: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const version = ctx.getArgInt(1);
    ctx.module.fileFormatVersion.push(version);
    if (version >= NAMED_ONLY_FORMAT_VERSION) {
        ctx.importer.disable();
    }
    ctx.currentBlock = null;
};

export const parseFileinfo: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const fileinfo: Fileinfo = {
        uniqueId: ctx.getArgStr(1).trim(),
        categoryId: -1,
        fileVersion: 0,
    };
    if (ctx.numArgs > 2) { fileinfo.categoryId = ctx.getArgInt(2); }
    if (ctx.numArgs > 3) { fileinfo.fileVersion = ctx.getArgInt(3); }

    ctx.module.fileinfo.push(fileinfo);
    ctx.currentBlock = null;
};

export const parseAuthor: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    const author: Author = {
        type: ctx.getArgStr(1),
        name: '',
        email: '',
    };
    if (ctx.numArgs > 2) { author.forumAccountId = ctx.getArgInt(2); }
    if (ctx.numArgs > 3) { author.name = ctx.getArgStr(3); }
    if (ctx.numArgs > 4) { author.email = ctx.getArgStr(4); }

    ctx.module.author.push(author);
    ctx.currentBlock = null;
};

export const parseGuid: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.module.guid.push(ctx.getArgStr(1));
};

//#endregion

//#region Metadata Sections

export const parseGlobals: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.module.globals.push({
        dryMass: ctx.getArgFloat(0),
        cargoMass: ctx.getArgFloat(1),
        materialName: ctx.numArgs > 2 ? ctx.getArgStr(2) : '',
    });
};

export const parseGuiSettings: LineHandler = (ctx) => {
    if (!ctx.checkNumArguments(2)) { return; }

    ctx.module.guiSettings.push({
        key: ctx.getArgStr(0),
        value: ctx.getArgStr(1),
    });
};

/** The whole line is the material name */
export const parseHelp: LineHandler = (ctx) => {
    ctx.module.help.push({ material: ctx.line });
};

export const parseDescription: LineHandler = (ctx) => {
    ctx.module.description.push(ctx.line);
};

//#endregion
