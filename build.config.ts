import { defineBuildConfig } from 'unbuild';

export default defineBuildConfig({
    entries: ['src/index', 'src/vite-plugin'],
    declaration: true,
    // vite is only needed by consumers of the plugin entry
    externals: ['vite'],
});
