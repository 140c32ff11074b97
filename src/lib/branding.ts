export const CLI_NAME = 'htpcgui-pkg';
export const CLI_VERSION = '0.1.0';

export const CONFIG_FILE_NAME = 'htpcgui-pkg.config.json';
export const BUILD_REPORT_FILE_NAME = 'BUILD_REPORT.json';
export const PKGINFO_FILE_NAME = '.PKGINFO';
