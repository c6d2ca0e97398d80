/** A page that trips four of the ten rules: 6 pass, 2 warnings, 2 failures. */
export const SAMPLE_PAGE = `<!doctype html>
<html lang="en">
<head><title>Shop</title></head>
<body>
<h1>Shop</h1>
<h3>Deals</h3>
<img src="a.png"><img src="b.png" alt="">
<a href="#">Click here</a>
<div id="x"></div><span id="x"></span>
</body>
</html>`;

export const CLEAN_PAGE = `<!doctype html>
<html lang="en">
<head><title>Welcome</title></head>
<body><h1>Welcome</h1><p>Nothing to see.</p></body>
</html>`;
