/**
 * Scripts evaluated inside the page
 */

/** Console marker the injected observer logs once per mutation batch */
export const DOM_MUTATION_SIGNAL = '__DOM_MUTATION__';

/** Page-side global that guards against installing a second observer */
export const OBSERVER_GLOBAL = '__stabilityMutationObserver';

/**
 * Installs one MutationObserver per document. Evaluates to `true` when it
 * installed the observer and `false` when one was already present.
 */
export const MUTATION_OBSERVER_SCRIPT = `(() => {
    if (window.${OBSERVER_GLOBAL}) {
        return false;
    }
    const observer = new MutationObserver(mutations => {
        if (mutations.length > 0) {
            console.log('${DOM_MUTATION_SIGNAL}');
        }
    });
    observer.observe(document.documentElement || document, {
        childList: true,
        subtree: true,
        attributes: true,
        characterData: true
    });
    window.${OBSERVER_GLOBAL} = observer;
    return true;
})()`;

export type ResourceClass = 'images' | 'stylesheets' | 'fonts' | 'scripts';

export const RESOURCE_CLASSES: readonly ResourceClass[] = ['images', 'stylesheets', 'fonts', 'scripts'];

/** Predicates that evaluate to `true` once every resource of the class has loaded */
export const RESOURCE_SCRIPTS: Record<ResourceClass, string> = {
    images: `Array.from(document.images).every(img => img.complete && img.naturalHeight !== 0)`,
    stylesheets: `Array.from(document.styleSheets).every(sheet => {
        try { return sheet.cssRules !== null; } catch (e) { return true; }
    })`,
    fonts: `document.fonts ? document.fonts.ready.then(() => true) : true`,
    scripts: `Array.from(document.scripts).every(script => !script.src || !script.readyState || script.readyState === 'complete')`,
};

export const ANIMATION_FRAME_SCRIPT = `new Promise(resolve => requestAnimationFrame(() => resolve(true)))`;

export const IDLE_CALLBACK_SCRIPT = `new Promise(resolve => {
    if ('requestIdleCallback' in window) {
        requestIdleCallback(() => resolve(true), { timeout: 1000 });
    } else {
        setTimeout(() => resolve(true), 0);
    }
})`;

export const READY_STATE_SCRIPT = `document.readyState`;
