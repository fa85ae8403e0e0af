import { NodePackageCi } from './workflows';

NodePackageCi.main().catch((err) => {
    console.error('[pipeline] fatal:', err);
    process.exit(1);
});
