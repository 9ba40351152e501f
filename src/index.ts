/**
 * paramforge: self-describing command-line parameters.
 *
 * Declare typed parameters by section and key, bind them to flags or
 * positions, persist them as ini text and describe them as an XML
 * manifest for GUI hosts.
 *
 * @module
 */

// Application
export { Application } from './app/Application.js';
export type { ApplicationOptions } from './app/Application.js';
export { AppMetadata, METADATA_FIELDS } from './app/metadata.js';
export type { MetadataField, MetadataInit } from './app/metadata.js';

// Parameters
export { PARAM_KINDS, kind_isKnown } from './params/kinds.js';
export type {
    CoordinateKind,
    EnumerationKind,
    FileLikeKind,
    KindValueMap,
    ParamKind,
    ParamValue,
    TypedAssetKind
} from './params/kinds.js';
export {
    kindCodec_get,
    paramValue_decode,
    paramValue_encode,
    paramValue_initial,
    sequence_split
} from './params/codec.js';
export type { KindCodec } from './params/codec.js';
export { ParamRecord } from './params/ParamRecord.js';
export { ParamRegistry } from './params/ParamRegistry.js';
export { ParamBuilder, param_access, param_define, paramName_normalize } from './params/ParamBuilder.js';
export type { ParamContext } from './params/ParamBuilder.js';
export type { ParamAddress, ParamEntry } from './params/types.js';

// Command line
export { FlagBinder, flagToken_classify } from './cli/FlagBinder.js';
export type { FlagTokenClass } from './cli/FlagBinder.js';
export {
    commandLine_parse,
    HELP_TOKENS,
    LOAD_INI_TOKEN,
    SAVE_INI_TOKEN,
    XML_TOKEN
} from './cli/commandLine.js';
export type { CommandLineHost, CommandLineResult } from './cli/commandLine.js';
export { CaptureSink, consoleSink_create } from './cli/output.js';
export type { OutputSink } from './cli/output.js';
export { synopsis_render } from './cli/synopsis.js';

// Ini persistence
export { INI_DEFAULT_SECTION, ini_parse, ini_serialize, iniFile_load, iniFile_save } from './ini/iniCodec.js';
export type { IniLoadResult, IniParseReport, IniSaveResult, IniUnknownKey } from './ini/iniCodec.js';
export { FileTextStore, MemoryTextStore } from './ini/TextStore.js';
export type { TextStore } from './ini/TextStore.js';

// Manifest
export { manifest_render, xml_escape } from './manifest/xmlManifest.js';

// Descriptor
export { application_fromDescriptor, application_fromYaml, descriptor_parse } from './descriptor/descriptor.js';
export type { Descriptor, DescriptorParameter } from './descriptor/schemas.js';

// Configuration
export { colorMode_resolve } from './config/settings.js';
export type { ColorMode } from './config/settings.js';
