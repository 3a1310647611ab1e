/**
 * Constants for the binary and ASCII file layouts.
 */

export const FormatConstants = {
    /** 24-bit magic at the start of a curv file */
    CURV_MAGIC: 0xffffff,

    /** 24-bit magic at the start of a triangle surf file */
    SURF_MAGIC: 0xfffffe,

    /** Face count written into curv headers; readers ignore it */
    CURV_DEFAULT_NUM_FACES: 100000,

    /** Only version of the MGH layout there is */
    MGH_VERSION: 1,

    /** Bytes from the start of an MGH file to the first voxel value */
    MGH_HEADER_SIZE: 284,

    /** Bytes before the optional RAS block: version, 4 dims, dtype, dof (i32) and the ras flag (i16) */
    MGH_FIXED_HEADER_SIZE: 7 * 4 + 2,

    /** Size of the RAS block: 3 voxel sizes, 9 direction cosines, 3 center coordinates */
    MGH_RAS_BLOCK_SIZE: 15 * 4,

    /** Colortable layout version written and accepted in annot files */
    ANNOT_COLORTABLE_VERSION: 2,

    /** First line of written label files */
    LABEL_COMMENT: '#!ascii label  , from subject  vox2ras=TkReg',

    /** Creator line of written surf files */
    SURF_CREATOR: 'created by cortexio',

    /** Basename suffixes of per-vertex morphometry files, e.g. `lh.thickness` */
    CURV_MEASURES: ['thickness', 'area', 'curv', 'sulc', 'volume', 'jacobian_white'] as const,

    /** Basename suffixes of surface files, e.g. `lh.white` */
    SURFACE_NAMES: ['white', 'pial', 'inflated', 'sphere', 'sphere.reg', 'orig', 'smoothwm'] as const
}
